import { z } from 'zod';

export const runtimeSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type RuntimeConfig = z.infer<typeof runtimeSchema>;

export const providerNameSchema = z.enum(['local', 'hosted-chat', 'hosted-generative']);

export type ProviderName = z.infer<typeof providerNameSchema>;

const timeoutMs = z.number().int().positive().default(120_000);
const temperature = z.number().min(0).max(2).default(0.7);

export const localSettingsSchema = z.object({
  url: z.string().url().default('http://localhost:11434/api/generate'),
  model: z.string().min(1),
  timeoutMs,
});

export const hostedChatSettingsSchema = z.object({
  apiKey: z.string().min(1),
  model: z.string().min(1).default('gpt-4o-mini'),
  url: z.string().url().optional(),
  timeoutMs,
  temperature,
});

// gemini-2.0-flash is the recommended default model
export const hostedGenerativeSettingsSchema = z.object({
  apiKey: z.string().min(1),
  model: z.string().min(1).default('gemini-2.0-flash'),
  timeoutMs,
  temperature,
});

export const llmConfigSchema = z.discriminatedUnion('provider', [
  z.object({ provider: z.literal('local'), settings: localSettingsSchema }),
  z.object({ provider: z.literal('hosted-chat'), settings: hostedChatSettingsSchema }),
  z.object({ provider: z.literal('hosted-generative'), settings: hostedGenerativeSettingsSchema }),
]);

export const taxonomySchema = z.object({
  topCategories: z.array(z.string().min(1)).default([]),
  subCategories: z.record(z.string(), z.array(z.string().min(1))).default({}),
  specificCategories: z.record(z.string(), z.array(z.string().min(1))).default({}),
});

export const generationSchema = z.object({
  batchSize: z.number().int().positive().default(5),
  numWorkers: z.number().int().positive().max(16).default(1),
  maxAttempts: z.number().int().positive().max(10).default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(2_000),
  retryMaxDelayMs: z.number().int().nonnegative().default(30_000),
  rateLimitDelayMs: z.number().int().nonnegative().default(60_000),
  onBatchFailure: z.enum(['pause', 'abort']).default('pause'),
  closedOnly: z.boolean().default(true),
});

export const businessHoursSchema = z
  .object({
    startHour: z.number().int().min(0).max(23).default(8),
    endHour: z.number().int().min(1).max(24).default(17),
    days: z.array(z.number().int().min(0).max(6)).min(1).default([1, 2, 3, 4, 5]),
  })
  .refine(hours => hours.startHour < hours.endHour, {
    message: 'start_hour must be before end_hour',
  });

export const outputSchema = z.object({
  cacheFile: z.string().min(1).default('temp_incidents.json'),
  outputFile: z.string().min(1).default('incidents_export.xlsx'),
  clearCacheOnSuccess: z.boolean().default(false),
});

export const configSchema = z.object({
  llm: llmConfigSchema,
  generation: generationSchema.default({}),
  categories: taxonomySchema.optional(),
  businessHours: businessHoursSchema.default({}),
  output: outputSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type LLMConfig = z.infer<typeof llmConfigSchema>;
export type GenerationSettings = z.infer<typeof generationSchema>;
export type LocalSettings = z.infer<typeof localSettingsSchema>;
export type HostedChatSettings = z.infer<typeof hostedChatSettingsSchema>;
export type HostedGenerativeSettings = z.infer<typeof hostedGenerativeSettingsSchema>;
