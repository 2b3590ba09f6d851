import { z } from 'zod';
import { buildConfig, isGenerationConfigured, parseArgs } from '../src/config.js';

describe('parseArgs', () => {
  test('should read flags with and without values', () => {
    expect(parseArgs(['--port', '9000', '--debug', '--database', ':memory:'])).toEqual({
      port: '9000',
      debug: true,
      database: ':memory:',
    });
  });
});

describe('buildConfig', () => {
  test('should apply defaults', () => {
    const config = buildConfig({}, {});

    expect(config.http.port).toBe(8000);
    expect(config.database.path).toBe('data/dialogs.db');
    expect(config.generation).toEqual({
      apiKey: undefined,
      baseUrl: undefined,
      model: 'gpt-4o',
      systemPrompt: '',
    });
    expect(config.mcp.enabled).toBe(false);
    expect(isGenerationConfigured(config)).toBe(false);
  });

  test('should let CLI arguments override environment variables', () => {
    const config = buildConfig({ port: '9001', debug: true }, { API_PORT: '9000', DEBUG: 'false' });

    expect(config.http.port).toBe(9001);
    expect(config.server.debug).toBe(true);
  });

  test('should treat empty credentials as unconfigured', () => {
    const config = buildConfig({}, { OPENAI_API_KEY: '', PROXY_URL: '' });

    expect(isGenerationConfigured(config)).toBe(false);
  });

  test('should require both the key and the proxy URL for generation', () => {
    expect(isGenerationConfigured(buildConfig({}, { OPENAI_API_KEY: 'test-secret' }))).toBe(false);
    expect(
      isGenerationConfigured(
        buildConfig({}, { OPENAI_API_KEY: 'test-secret', PROXY_URL: 'https://proxy.test/v1' })
      )
    ).toBe(true);
  });

  test('should reject an invalid port', () => {
    expect(() => buildConfig({}, { API_PORT: 'not-a-port' })).toThrow(z.ZodError);
  });

  test('should reject an invalid classifier URL', () => {
    expect(() => buildConfig({}, { CLASSIFIER_URL: 'classifier' })).toThrow(z.ZodError);
  });
});
