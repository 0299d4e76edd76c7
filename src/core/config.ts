import Conf from 'conf';
import { z } from 'zod';
import { ToolProviderSpec } from '../mcp/types.js';
import { TOOL_NAME_SEPARATOR } from '../mcp/connection.js';
import { DEFAULT_CACHE_URL } from '../storage/factory.js';
import { ConfigurationError } from '../utils/errors.js';
import { LogLevel, logger, parseLogLevel } from '../utils/logger.js';

const emptyAsUnset = (value: unknown) => (value === '' ? undefined : value);

const seconds = (defaultValue: number) =>
  z.preprocess(emptyAsUnset, z.coerce.number().positive().default(defaultValue));

const count = (defaultValue: number) =>
  z.preprocess(emptyAsUnset, z.coerce.number().int().positive().default(defaultValue));

const EnvSchema = z.object({
  MCP_CONNECT_TIMEOUT: seconds(30),
  MCP_CLEANUP_TIMEOUT: seconds(10),
  MCP_SERVER_TIMEOUT: seconds(300),
  CACHE_TTL_SECONDS: count(604_800),
  AGENT_MAX_CACHE_SIZE: count(50),
  SINGLE_CHUNK_THRESHOLD: count(10_000),
  MAX_SYNTHESIS_CHARS: count(2000),
  CONDENSE_TIMEOUT: seconds(60),
  CACHE_URL: z.preprocess(emptyAsUnset, z.string().optional()),
  OPENAI_BASE_URL: z.preprocess(emptyAsUnset, z.string().url().default('https://api.openai.com/v1')),
  OPENAI_API_KEY: z.preprocess(emptyAsUnset, z.string().optional()),
  OPENAI_MODEL: z.preprocess(emptyAsUnset, z.string().default('gpt-4o-mini')),
  OPENAI_TEMPERATURE: z.preprocess(emptyAsUnset, z.coerce.number().min(0).max(2).default(0)),
  AGENT_MAX_ITERATIONS: count(10),
  PARLEY_LOG_LEVEL: z.preprocess(
    emptyAsUnset,
    z
      .string()
      .default(LogLevel.INFO)
      .transform((value, ctx) => {
        const level = parseLogLevel(value);
        if (!level) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level '${value}'` });
          return z.NEVER;
        }
        return level;
      })
  ),
});

export interface Settings {
  connectTimeoutSeconds: number;
  cleanupTimeoutSeconds: number;
  serverTimeoutSeconds: number;
  cacheTtlSeconds: number;
  maxCacheSize: number;
  singleChunkThreshold: number;
  maxSynthesisChars: number;
  condenseTimeoutSeconds: number;
  cacheUrl: string;
  openaiBaseUrl: string;
  openaiApiKey?: string;
  openaiModel: string;
  openaiTemperature: number;
  maxIterations: number;
  logLevel: LogLevel;
}

/**
 * Read settings from the environment. Empty strings count as unset.
 */
export function loadSettings(env: Readonly<Record<string, string | undefined>> = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid settings: ${details.join('; ')}`);
  }

  const values = parsed.data;
  if (!values.CACHE_URL) {
    logger.warn(`CACHE_URL is not set; using in-process cache (${DEFAULT_CACHE_URL}). History is lost on restart.`);
  }

  return {
    connectTimeoutSeconds: values.MCP_CONNECT_TIMEOUT,
    cleanupTimeoutSeconds: values.MCP_CLEANUP_TIMEOUT,
    serverTimeoutSeconds: values.MCP_SERVER_TIMEOUT,
    cacheTtlSeconds: values.CACHE_TTL_SECONDS,
    maxCacheSize: values.AGENT_MAX_CACHE_SIZE,
    singleChunkThreshold: values.SINGLE_CHUNK_THRESHOLD,
    maxSynthesisChars: values.MAX_SYNTHESIS_CHARS,
    condenseTimeoutSeconds: values.CONDENSE_TIMEOUT,
    cacheUrl: values.CACHE_URL ?? DEFAULT_CACHE_URL,
    openaiBaseUrl: values.OPENAI_BASE_URL,
    openaiApiKey: values.OPENAI_API_KEY,
    openaiModel: values.OPENAI_MODEL,
    openaiTemperature: values.OPENAI_TEMPERATURE,
    maxIterations: values.AGENT_MAX_ITERATIONS,
    logLevel: values.PARLEY_LOG_LEVEL,
  };
}

const ProviderConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  enabled: z.boolean().default(true),
});

const ProvidersSchema = z.record(ProviderConfigSchema);

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;

const ParleyConfigSchema = z.object({
  providers: ProvidersSchema,
});

type ParleyConfig = z.infer<typeof ParleyConfigSchema>;

function validateProviderName(name: string): void {
  if (!name.trim()) {
    throw new ConfigurationError('Tool provider name must not be empty');
  }
  if (name.includes(TOOL_NAME_SEPARATOR)) {
    throw new ConfigurationError(`Tool provider name '${name}' must not contain '${TOOL_NAME_SEPARATOR}'`);
  }
}

/**
 * Validate a JSON-shaped provider map and return the enabled providers.
 */
export function parseProviderSpecs(raw: unknown): ToolProviderSpec[] {
  const parsed = ProvidersSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid tool provider configuration: ${details.join('; ')}`);
  }

  const specs: ToolProviderSpec[] = [];
  for (const [name, provider] of Object.entries(parsed.data)) {
    validateProviderName(name);
    if (!provider.enabled) {
      continue;
    }
    specs.push({ name, command: provider.command, args: provider.args, env: provider.env });
  }
  return specs;
}

export interface ConfigManagerOptions {
  /** Directory holding config.json. Defaults to the per-user config dir. */
  cwd?: string;
}

export class ConfigManager {
  private store: Conf<ParleyConfig>;
  private static instance: ConfigManager;

  constructor(options: ConfigManagerOptions = {}) {
    this.store = new Conf<ParleyConfig>({
      projectName: 'parley',
      cwd: options.cwd,
      defaults: { providers: {} },
    });
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  getProviderSpecs(): ToolProviderSpec[] {
    return parseProviderSpecs(this.store.get('providers'));
  }

  listProviders(): Record<string, ProviderConfig> {
    return { ...this.store.get('providers') };
  }

  addProvider(name: string, config: ProviderConfigInput): ProviderConfig {
    validateProviderName(name);
    const parsed = ProviderConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid tool provider '${name}': ${parsed.error.issues.map(issue => issue.message).join('; ')}`
      );
    }
    this.store.set('providers', { ...this.store.get('providers'), [name]: parsed.data });
    return parsed.data;
  }

  removeProvider(name: string): boolean {
    const providers = { ...this.store.get('providers') };
    if (!(name in providers)) {
      return false;
    }
    delete providers[name];
    this.store.set('providers', providers);
    return true;
  }

  reset() {
    this.store.clear();
  }

  getConfigPath(): string {
    return this.store.path;
  }
}
