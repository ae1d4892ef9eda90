export const DEFAULT_PROTOCOL_VERSION = '2024-11-05';

export const SUPPORTED_PROTOCOL_VERSIONS = [
  '2025-06-18',
  '2025-03-26',
  '2024-11-05'
] as const;

export const SERVER_INFO = { name: 'mcp-diagram-server', version: '0.1.0' } as const;

export function negotiateProtocolVersion(requested: unknown): string {
  if (typeof requested !== 'string') return DEFAULT_PROTOCOL_VERSION;
  return SUPPORTED_PROTOCOL_VERSIONS.some((version) => version === requested) ? requested : DEFAULT_PROTOCOL_VERSION;
}
