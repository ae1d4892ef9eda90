import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config/index.js';
import { configSchema } from '../src/config/schema.js';

describe('configSchema', () => {
  it('applies defaults', () => {
    const config = configSchema.parse({});

    expect(config.PORT).toBe(8050);
    expect(config.HOST).toBe('0.0.0.0');
    expect(config.LOG_LEVEL).toBe('info');
    expect(config.PLANTUML_SERVER).toBe('https://www.plantuml.com/plantuml');
    expect(config.GRAPHVIZ_DOT).toBe('dot');
    expect(config.MERMAID_CLI).toBe('mmdc');
    expect(config.MERMAID_NPX_FALLBACK).toBe(true);
    expect(config.RENDER_TIMEOUT_MS).toBe(30000);
  });

  it('parses boolean flags literally', () => {
    expect(configSchema.parse({ MERMAID_NPX_FALLBACK: 'false' }).MERMAID_NPX_FALLBACK).toBe(false);
    expect(configSchema.parse({ MERMAID_NPX_FALLBACK: '1' }).MERMAID_NPX_FALLBACK).toBe(true);
  });

  it('strips trailing slashes from the PlantUML server', () => {
    expect(configSchema.parse({ PLANTUML_SERVER: 'http://localhost:8080/plantuml/' }).PLANTUML_SERVER).toBe(
      'http://localhost:8080/plantuml'
    );
  });

  it('rejects invalid values', () => {
    expect(() => configSchema.parse({ PORT: 'abc' })).toThrow();
    expect(() => configSchema.parse({ LOG_LEVEL: 'verbose' })).toThrow();
  });
});

describe('loadConfig', () => {
  it('reads the given environment', () => {
    const config = loadConfig({ PORT: '9000', GRAPHVIZ_DOT: '/usr/local/bin/dot', RENDER_TIMEOUT_MS: '5000' });

    expect(config.PORT).toBe(9000);
    expect(config.GRAPHVIZ_DOT).toBe('/usr/local/bin/dot');
    expect(config.RENDER_TIMEOUT_MS).toBe(5000);
  });
});
