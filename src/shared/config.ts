import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './logger.js';

export const DEFAULT_CONFIG_FILE = 'pylens.yaml';

export const MODEL_PROVIDERS = ['none', 'openai', 'anthropic', 'gemini'] as const;
export type ModelProviderName = (typeof MODEL_PROVIDERS)[number];

export const DEFAULT_MODELS: Record<Exclude<ModelProviderName, 'none'>, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
  gemini: 'gemini-2.0-flash'
};

export interface AppConfig {
  redisUrl: string | null;
  cache: {
    ttlSeconds: number;
    fallbackMaxEntries: number;
    leaseTtlMs: number;
    leasePollIntervalMs: number;
  };
  history: {
    databasePath: string | null;
    persistSnippets: boolean;
  };
  rules: {
    maxFunctionLength: number;
    maxComplexity: number;
    disabled: string[];
  };
  model: {
    provider: ModelProviderName;
    name: string | null;
    apiKey: string | null;
    baseUrl: string | null;
  };
  requestTimeoutMs: number;
  logLevel: LogLevel;
  port: number;
  /** Absolute path of the YAML file that was read, if any. */
  configFile: string | null;
}

export type Environment = Record<string, string | undefined>;

export interface LoadConfigOptions {
  env?: Environment;
  /**
   * YAML file to layer between defaults and the environment. `undefined`
   * looks for `pylens.yaml` in `cwd`; `null` disables the lookup.
   */
  configFile?: string | null;
  cwd?: string;
}

const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform(v => v === 'true' || v === '1' || v === 'yes')
]);

const ruleList = z.union([
  z.array(z.string()),
  z.string().transform(v => v.split(',').map(s => s.trim()).filter(s => s.length > 0))
]);

const positiveInt = z.coerce.number().int().positive();

const optionalString = z
  .string()
  .trim()
  .nullish()
  .transform(v => (v ? v : null));

const ConfigSchema = z.object({
  redisUrl: optionalString,
  cache: z.object({
    ttlSeconds: positiveInt.default(3600),
    fallbackMaxEntries: positiveInt.default(1000),
    leaseTtlMs: positiveInt.default(10_000),
    leasePollIntervalMs: positiveInt.default(50)
  }),
  history: z.object({
    databasePath: optionalString,
    persistSnippets: booleanish.default(true)
  }),
  rules: z.object({
    maxFunctionLength: positiveInt.default(50),
    maxComplexity: positiveInt.default(10),
    disabled: ruleList.default([])
  }),
  model: z.object({
    provider: z
      .string()
      .default('none')
      .transform(v => v.toLowerCase())
      .pipe(z.enum(MODEL_PROVIDERS)),
    name: optionalString,
    apiKey: optionalString,
    baseUrl: optionalString.pipe(z.string().url().nullable())
  }),
  requestTimeoutSeconds: positiveInt.default(30),
  logLevel: z
    .string()
    .default('info')
    .transform(v => v.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error', 'silent'])),
  port: z.coerce.number().int().min(0).max(65535).default(8080)
});

// Same tree as the YAML file accepts; every leaf optional and loosely typed
// so that environment strings and YAML scalars share one validation pass.
const FileSchema = z
  .object({
    redisUrl: z.string().nullish(),
    cache: z
      .object({
        ttlSeconds: z.union([z.number(), z.string()]),
        fallbackMaxEntries: z.union([z.number(), z.string()]),
        leaseTtlMs: z.union([z.number(), z.string()]),
        leasePollIntervalMs: z.union([z.number(), z.string()])
      })
      .partial()
      .default({}),
    history: z
      .object({
        databasePath: z.string().nullish(),
        persistSnippets: z.union([z.boolean(), z.string()])
      })
      .partial()
      .default({}),
    rules: z
      .object({
        maxFunctionLength: z.union([z.number(), z.string()]),
        maxComplexity: z.union([z.number(), z.string()]),
        disabled: z.union([z.array(z.string()), z.string()])
      })
      .partial()
      .default({}),
    model: z
      .object({
        provider: z.string(),
        name: z.string().nullish(),
        apiKey: z.string().nullish(),
        baseUrl: z.string().nullish()
      })
      .partial()
      .default({}),
    requestTimeoutSeconds: z.union([z.number(), z.string()]),
    logLevel: z.string(),
    port: z.union([z.number(), z.string()])
  })
  .partial()
  .strict();

type FileConfig = z.infer<typeof FileSchema>;

/**
 * Builds the process configuration: defaults, then the optional YAML file,
 * then the environment. The result is frozen.
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<AppConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configFile = resolveConfigFile(options.configFile, env, cwd);
  const file = configFile ? readConfigFile(configFile) : FileSchema.parse({});

  const merged = {
    redisUrl: env.REDIS_URL ?? file.redisUrl,
    cache: {
      ttlSeconds: env.CACHE_TTL_SECONDS ?? file.cache?.ttlSeconds,
      fallbackMaxEntries: env.FALLBACK_CACHE_MAX_ENTRIES ?? file.cache?.fallbackMaxEntries,
      leaseTtlMs: env.LEASE_TTL_MS ?? file.cache?.leaseTtlMs,
      leasePollIntervalMs: env.LEASE_POLL_INTERVAL_MS ?? file.cache?.leasePollIntervalMs
    },
    history: {
      databasePath: env.DATABASE_PATH ?? file.history?.databasePath,
      persistSnippets: env.PERSIST_SNIPPETS ?? file.history?.persistSnippets
    },
    rules: {
      maxFunctionLength: env.MAX_FUNCTION_LENGTH ?? file.rules?.maxFunctionLength,
      maxComplexity: env.MAX_COMPLEXITY ?? file.rules?.maxComplexity,
      disabled: env.DISABLED_RULES ?? file.rules?.disabled
    },
    model: {
      provider: env.MODEL_PROVIDER ?? file.model?.provider,
      name: env.MODEL_NAME ?? file.model?.name,
      apiKey: file.model?.apiKey,
      baseUrl: env.MODEL_BASE_URL ?? file.model?.baseUrl
    },
    requestTimeoutSeconds: env.REQUEST_TIMEOUT ?? file.requestTimeoutSeconds,
    logLevel: env.LOG_LEVEL ?? file.logLevel,
    port: env.PORT ?? file.port
  };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path.join('.') : undefined;
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${detail}`, key);
  }

  const values = parsed.data;
  const apiKey = apiKeyFromEnv(values.model.provider, env) ?? values.model.apiKey ?? null;
  if (values.model.provider !== 'none' && !apiKey) {
    throw new ConfigurationError(
      `Model provider "${values.model.provider}" requires an API key`,
      'model.apiKey'
    );
  }

  const config: AppConfig = {
    redisUrl: values.redisUrl,
    cache: { ...values.cache },
    history: { ...values.history },
    rules: { ...values.rules, disabled: [...values.rules.disabled] },
    model: {
      provider: values.model.provider,
      name: values.model.provider === 'none' ? null : (values.model.name ?? DEFAULT_MODELS[values.model.provider]),
      apiKey: values.model.provider === 'none' ? null : apiKey,
      baseUrl: values.model.baseUrl
    },
    requestTimeoutMs: values.requestTimeoutSeconds * 1000,
    logLevel: values.logLevel,
    port: values.port,
    configFile
  };

  return deepFreeze(config);
}

function resolveConfigFile(explicit: string | null | undefined, env: Environment, cwd: string): string | null {
  if (explicit === null) return null;

  const requested = explicit ?? env.PYLENS_CONFIG;
  if (requested) {
    const absolute = path.resolve(cwd, requested);
    if (!existsSync(absolute)) {
      throw new ConfigurationError(`Configuration file not found: ${absolute}`, 'configFile');
    }
    return absolute;
  }

  const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(candidate) ? candidate : null;
}

function readConfigFile(file: string): FileConfig {
  let document: unknown;
  try {
    document = yaml.load(readFileSync(file, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not read ${file}: ${reason}`, 'configFile');
  }

  // An empty file loads as undefined.
  const parsed = FileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration file ${file}: ${detail}`, 'configFile');
  }
  return parsed.data;
}

function apiKeyFromEnv(provider: ModelProviderName, env: Environment): string | undefined {
  switch (provider) {
    case 'openai':
      return env.OPENAI_API_KEY || undefined;
    case 'anthropic':
      return env.ANTHROPIC_API_KEY || env.CLAUDE_API_KEY || undefined;
    case 'gemini':
      return env.GEMINI_API_KEY || env.GOOGLE_API_KEY || undefined;
    case 'none':
      return undefined;
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
