import 'dotenv/config';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { ConfigurationError } from '../utils/errors.js';
import { configSchema, runtimeSchema, type Config, type RuntimeConfig } from './validation.js';

export type { Config as AppConfig } from './validation.js';

function loadRuntime(): RuntimeConfig {
  const result = runtimeSchema.safeParse({
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,
  });

  if (!result.success) {
    console.error('\n❌ Invalid environment:\n');
    result.error.issues.forEach(issue => {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    });
    process.exit(1);
  }

  return result.data;
}

export const runtime = loadRuntime();

/**
 * Where the generator gets its settings from. The file-backed source is the
 * only one shipped here; an interactive wizard would implement the same
 * interface and return `null` when the operator backs out.
 */
export interface ConfigSource {
  readonly description: string;
  load(): Promise<Config | null>;
}

const PROVIDER_ALIASES: Record<string, string> = {
  local: 'local',
  ollama: 'local',
  'hosted-chat': 'hosted-chat',
  hosted_chat: 'hosted-chat',
  openai: 'hosted-chat',
  'hosted-generative': 'hosted-generative',
  hosted_generative: 'hosted-generative',
  gemini: 'hosted-generative',
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Keys starting with `_` are comments in config.json. */
export const stripComments = (value: Record<string, unknown>): Record<string, unknown> => {
  const cleaned: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (key.startsWith('_')) continue;
    cleaned[key] = isRecord(entry) ? stripComments(entry) : entry;
  }
  return cleaned;
};

const section = (file: Record<string, unknown>, ...names: string[]): Record<string, unknown> | undefined => {
  for (const name of names) {
    const candidate = file[name];
    if (isRecord(candidate)) return candidate;
  }
  return undefined;
};

const normalizeProvider = (value: unknown): unknown =>
  typeof value === 'string' ? PROVIDER_ALIASES[value.trim().toLowerCase()] ?? value : value;

const nonEmpty = (value: string | undefined): string | undefined => (value ? value : undefined);

/** Maps the snake_case config file (plus env fallbacks) onto the shape `configSchema` validates. */
export function toRawConfig(file: Record<string, unknown>, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const provider = normalizeProvider(file.llm_provider ?? nonEmpty(env.LLM_PROVIDER) ?? 'hosted-generative');
  const envModel = nonEmpty(env.LLM_MODEL);

  let settings: Record<string, unknown> = {};
  if (provider === 'local') {
    const local = section(file, 'local', 'ollama');
    settings = {
      url: local?.url,
      model: local?.model ?? envModel,
      timeoutMs: local?.timeout_ms,
    };
  } else if (provider === 'hosted-chat') {
    const chat = section(file, 'hosted_chat', 'hosted-chat', 'openai');
    settings = {
      apiKey: chat?.api_key ?? nonEmpty(env.OPENAI_API_KEY),
      model: chat?.model ?? envModel,
      url: chat?.url,
      timeoutMs: chat?.timeout_ms,
      temperature: chat?.temperature,
    };
  } else if (provider === 'hosted-generative') {
    const generative = section(file, 'hosted_generative', 'hosted-generative', 'gemini');
    settings = {
      apiKey: generative?.api_key ?? nonEmpty(env.GEMINI_API_KEY),
      model: generative?.model ?? envModel,
      timeoutMs: generative?.timeout_ms,
      temperature: generative?.temperature,
    };
  }

  const generation = section(file, 'generation');
  const categories = section(file, 'categories');
  const businessHours = section(file, 'business_hours');
  const output = section(file, 'output');

  return {
    llm: { provider, settings },
    generation: {
      batchSize: generation?.batch_size,
      numWorkers: generation?.num_workers,
      maxAttempts: generation?.max_attempts,
      retryBaseDelayMs: generation?.retry_base_delay_ms,
      retryMaxDelayMs: generation?.retry_max_delay_ms,
      rateLimitDelayMs: generation?.rate_limit_delay_ms,
      onBatchFailure: generation?.on_batch_failure,
      closedOnly: generation?.closed_only,
    },
    categories: categories
      ? {
          topCategories: categories.top_categories,
          subCategories: categories.sub_categories,
          specificCategories: categories.specific_categories,
        }
      : undefined,
    businessHours: {
      startHour: businessHours?.start_hour,
      endHour: businessHours?.end_hour,
      days: businessHours?.days,
    },
    output: {
      cacheFile: output?.cache_file,
      outputFile: output?.output_file,
      clearCacheOnSuccess: output?.clear_cache_on_success,
    },
  };
}

export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const config = result.data;
  const taxonomy = config.categories;
  const hasTaxonomy =
    taxonomy !== undefined &&
    (taxonomy.topCategories.length > 0 ||
      Object.keys(taxonomy.subCategories).length > 0 ||
      Object.keys(taxonomy.specificCategories).length > 0);

  return { ...config, categories: hasTaxonomy ? taxonomy : undefined };
}

export class FileConfigSource implements ConfigSource {
  constructor(
    private readonly path: string = 'config.json',
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  get description(): string {
    return this.path;
  }

  async load(): Promise<Config | null> {
    if (!existsSync(this.path)) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(this.path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read ${this.path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError(`${this.path} must contain a JSON object`);
    }

    return parseConfig(toRawConfig(stripComments(parsed), this.env));
  }
}

export async function loadConfig(source: ConfigSource): Promise<Config> {
  const config = await source.load();
  if (!config) {
    throw new ConfigurationError(
      `No configuration found at ${source.description}. Copy config.example.json to config.json and fill in your provider settings.`
    );
  }
  return config;
}
