export type JsonRpcId = string | number | null;

export interface JsonRpcRequest<T = unknown> {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: T;
}

export interface JsonRpcSuccess<T = unknown> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: T;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcError;
}

export type JsonRpcResponse<T = unknown> = JsonRpcSuccess<T> | JsonRpcErrorResponse;

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ImageContent {
  type: 'image';
  mimeType: string;
  data: string;
}

export interface ToolResult {
  content: ImageContent[];
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: { tools: Record<string, never>; prompts: Record<string, never>; resources: Record<string, never> };
  serverInfo: { name: string; version: string };
}
