import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  http: z.object({
    port: z.number().int().min(1).max(65535),
  }),
  database: z.object({
    path: z.string().min(1, 'Database path must not be empty'),
    readyAttempts: z.number().int().min(1).max(100),
    readyDelayMs: z.number().int().min(100).max(60000),
  }),
  generation: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url('Invalid proxy URL format').optional(),
    model: z.string().min(1),
    systemPrompt: z.string(),
  }),
  classifier: z.object({
    url: z.string().url('Invalid classifier URL format'),
    botLabel: z.string().min(1),
    humanLabel: z.string().min(1),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(100).max(10000),
    maxDelayMs: z.number().int().min(1000).max(60000),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export type CliArgs = Record<string, string | boolean>;

/**
 * Parse command line arguments
 * Usage: node dist/index.js --port 8000 --database data/dialogs.db --debug
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments and environment variables.
 * Throws a ZodError when the result is invalid.
 */
export function buildConfig(cliArgs: CliArgs, env: NodeJS.ProcessEnv): Config {
  const getString = (cliKey: string | null, envKey: string, defaultValue: string): string => {
    const cliValue = cliKey ? cliArgs[cliKey] : undefined;
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptional = (envKey: string): string | undefined => env[envKey] || undefined;

  const getBoolean = (cliKey: string | null, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliKey ? cliArgs[cliKey] : undefined;
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string | null, envKey: string, defaultValue: number): number => {
    const cliValue = cliKey ? cliArgs[cliKey] : undefined;
    if (typeof cliValue === 'string') return parseInt(cliValue, 10);
    const envValue = env[envKey];
    return envValue ? parseInt(envValue, 10) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'dialog-service'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    http: {
      port: getNumber('port', 'API_PORT', 8000),
    },
    database: {
      path: getString('database', 'DATABASE_PATH', 'data/dialogs.db'),
      readyAttempts: getNumber(null, 'DB_READY_ATTEMPTS', 15),
      readyDelayMs: getNumber(null, 'DB_READY_DELAY_MS', 2000),
    },
    generation: {
      apiKey: getOptional('OPENAI_API_KEY'),
      baseUrl: getOptional('PROXY_URL'),
      model: getString('model', 'OPENAI_MODEL', 'gpt-4o'),
      systemPrompt: getString(null, 'SYSTEM_PROMPT', ''),
    },
    classifier: {
      url: getString('classifier-url', 'CLASSIFIER_URL', 'http://localhost:8080/classify'),
      botLabel: getString(null, 'CLASSIFIER_BOT_LABEL', 'bot'),
      humanLabel: getString(null, 'CLASSIFIER_HUMAN_LABEL', 'human'),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
      initialDelayMs: getNumber(null, 'RETRY_INITIAL_DELAY_MS', 1000),
      maxDelayMs: getNumber(null, 'RETRY_MAX_DELAY_MS', 8000),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', false),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Generation is only called out to when both credentials and endpoint are set
 */
export function isGenerationConfigured(
  config: Config
): config is Config & { generation: { apiKey: string; baseUrl: string } } {
  return Boolean(config.generation.apiKey && config.generation.baseUrl);
}

/**
 * Get configuration from environment variables or CLI arguments.
 * Exits the process when validation fails.
 */
export function getConfig(): Config {
  try {
    return buildConfig(parseArgs(), process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\nConfiguration validation failed:\n');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  - ${path || 'root'}: ${err.message}`);
      });
      console.error('\nCheck your .env file and CLI arguments.\n');
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary. Credentials are never printed.
 */
export function printConfigInfo(config: Config): void {
  console.error(`Server: ${config.server.name} v${config.server.version}${config.server.debug ? ' (debug)' : ''}`);
  console.error(`HTTP port: ${config.http.port}`);
  console.error(`Database: ${config.database.path}`);
  console.error(
    isGenerationConfigured(config)
      ? `Generation: ${config.generation.model} via ${config.generation.baseUrl}`
      : 'Generation: not configured, replying with the fallback message'
  );
  console.error(`Classifier: ${config.classifier.url}`);
  console.error(`MCP stdio: ${config.mcp.enabled ? 'enabled' : 'disabled'}`);
  console.error('-'.repeat(60));
}
