/**
 * Configuration Schema
 *
 * Defines the shape of ~/.docqa/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['openai']).describe('Embedding provider'),
  model: z.string().min(1).describe('Embedding model name'),
  dimensions: z
    .number()
    .int()
    .positive()
    .describe('Vector length the model produces (text-embedding-3-small: 1536)'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .describe('Chunks embedded per request during ingestion (1-2048)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout in milliseconds for one embedding request'),
  pricing: z
    .record(z.string(), z.number().nonnegative())
    .describe('USD per 1K tokens, keyed by model name'),
  default_price_per_1k: z
    .number()
    .nonnegative()
    .describe('USD per 1K tokens for models missing from the pricing table'),
});

/**
 * Chunking configuration
 */
export const ChunkingConfigSchema = z.object({
  max_tokens_per_chunk: z.number().int().positive().describe('Upper bound on tokens per chunk'),
  overlap_tokens: z
    .number()
    .int()
    .nonnegative()
    .describe('Tokens repeated from the end of one chunk at the start of the next'),
});

/**
 * Search configuration
 */
export const SearchConfigSchema = z.object({
  default_top_k: z.number().int().min(1).max(100).describe('Chunks retrieved per query'),
  max_context_length: z
    .number()
    .int()
    .positive()
    .describe('Characters of each chunk placed into the generation context'),
});

/**
 * Answer generation configuration
 */
export const GenerationConfigSchema = z.object({
  chat_model: z.string().min(1).describe('Chat model used to answer questions'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature (0-2)'),
  max_tokens: z.number().int().positive().describe('Upper bound on answer tokens'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout in milliseconds for one generation request'),
  system_prompt: z.string().min(1).describe('Instructions sent ahead of every question'),
  user_prompt_template: z
    .string()
    .min(1)
    .describe('Must contain {context} and {query}'),
});

/**
 * Storage configuration
 */
export const StorageConfigSchema = z.object({
  busy_timeout_ms: z
    .number()
    .int()
    .nonnegative()
    .describe('How long a statement waits on a locked database before failing'),
});

const ConfigShape = z.object({
  embedding: EmbeddingConfigSchema,
  chunking: ChunkingConfigSchema,
  search: SearchConfigSchema,
  generation: GenerationConfigSchema,
  storage: StorageConfigSchema,
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = ConfigShape.superRefine((config, ctx) => {
  const { max_tokens_per_chunk, overlap_tokens } = config.chunking;
  if (overlap_tokens >= max_tokens_per_chunk) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['chunking', 'overlap_tokens'],
      message: `must be less than max_tokens_per_chunk (${max_tokens_per_chunk})`,
    });
  }
});

/**
 * Description of a dotted config key, or undefined when the key is not
 * part of the schema. Keys under a table such as embedding.pricing take
 * the table's description.
 */
export function describeConfigKey(key: string): string | undefined {
  let schema: z.ZodTypeAny = ConfigShape;
  for (const part of key.split('.')) {
    if (schema instanceof z.ZodObject) {
      const shape: z.ZodRawShape = schema.shape;
      const field: z.ZodTypeAny | undefined = shape[part];
      if (!field) return undefined;
      schema = field;
    } else if (schema instanceof z.ZodRecord) {
      const table: string | undefined = schema.description;
      schema = schema.valueSchema.describe(table ?? '');
    } else {
      return undefined;
    }
  }
  return schema instanceof z.ZodObject ? undefined : schema.description;
}

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;

/**
 * Every field optional, for sparse config files merged over defaults
 */
export const PartialConfigSchema = ConfigShape.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
