import { OUTPUT_FORMATS, type DiagramType, type OutputFormat } from '../renderers/renderer.js';

export interface ArgumentSpec {
  readonly type: 'string';
  readonly required: boolean;
  readonly description: string;
  readonly default?: string;
  readonly enum?: readonly string[];
}

export interface ToolDescriptor {
  /** Dotted tool name, e.g. `graphviz.render`. */
  readonly name: string;
  readonly diagramType: DiagramType;
  readonly description: string;
  /** Name of the argument holding the diagram source. */
  readonly sourceArgument: string;
  readonly arguments: Readonly<Record<string, ArgumentSpec>>;
}

export const DEFAULT_FORMAT: OutputFormat = 'svg';

function formatArgument(): ArgumentSpec {
  const spec: ArgumentSpec = {
    type: 'string',
    required: false,
    description: "Output format, 'svg' or 'png'",
    default: DEFAULT_FORMAT,
    enum: OUTPUT_FORMATS
  };
  return Object.freeze(spec);
}

function renderTool(diagramType: DiagramType, sourceArgument: string, description: string, sourceDescription: string): ToolDescriptor {
  const source: ArgumentSpec = { type: 'string', required: true, description: sourceDescription };
  const args: Record<string, ArgumentSpec> = {
    [sourceArgument]: Object.freeze(source),
    format: formatArgument()
  };
  const descriptor: ToolDescriptor = {
    name: `${diagramType}.render`,
    diagramType,
    description,
    sourceArgument,
    arguments: Object.freeze(args)
  };
  return Object.freeze(descriptor);
}

export const DIAGRAM_TOOLS: readonly ToolDescriptor[] = Object.freeze([
  renderTool('plantuml', 'text', 'Render PlantUML diagram text to image', 'PlantUML script'),
  renderTool('graphviz', 'dot', 'Render Graphviz DOT source to image', 'Graphviz DOT source'),
  renderTool('mermaid', 'text', 'Render Mermaid diagram to image', 'Mermaid source')
]);

export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolDescriptor>;

  constructor(descriptors: readonly ToolDescriptor[] = DIAGRAM_TOOLS) {
    this.tools = new Map(descriptors.map((descriptor) => [descriptor.name, descriptor]));
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  get(name: string): ToolDescriptor | null {
    return this.tools.get(name) ?? null;
  }
}

/** JSON schema advertised in MCP `tools/list`. */
export function toInputSchema(descriptor: ToolDescriptor): Record<string, unknown> {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const [name, spec] of Object.entries(descriptor.arguments)) {
    properties[name] = {
      type: spec.type,
      description: spec.description,
      ...(spec.enum ? { enum: [...spec.enum] } : {}),
      ...(spec.default !== undefined ? { default: spec.default } : {})
    };
    if (spec.required) required.push(name);
  }

  return { type: 'object', properties, required };
}

/** Argument listing used by the REST `/list_tools` endpoint. */
export function describeArguments(descriptor: ToolDescriptor): Record<string, ArgumentSpec> {
  return Object.fromEntries(
    Object.entries(descriptor.arguments).map(([name, spec]) => [
      name,
      { ...spec, ...(spec.enum ? { enum: [...spec.enum] } : {}) }
    ])
  );
}
