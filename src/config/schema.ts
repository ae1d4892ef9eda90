import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8050),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PLANTUML_SERVER: z
    .string()
    .url()
    .default('https://www.plantuml.com/plantuml')
    .transform((url) => url.replace(/\/+$/, '')),
  GRAPHVIZ_DOT: z.string().min(1).default('dot'),
  MERMAID_CLI: z.string().min(1).default('mmdc'),
  MERMAID_THEME: z.string().min(1).default('default'),
  MERMAID_NPX_FALLBACK: booleanFlag.default('true'),
  RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000)
});

export type AppConfig = z.infer<typeof configSchema>;
