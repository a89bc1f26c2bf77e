import { z } from "zod";

export const matchModeSchema = z.enum(["exact", "substring"]);

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  OPENAI_API_KEY: z.string().min(1),
  MODEL_NAME: z.string().min(1).default("gpt-4o-2024-08-06"),
  MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(500),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  HISTORY_LIMIT: z.coerce.number().int().positive().default(5),
  CATALOG_PATH: z.string().min(1).default("Merged_Dental_Products.csv"),
  MATCH_MODE: matchModeSchema.default("exact"),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional(),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
});

export const askInputSchema = z.object({
  product: z.string().max(500),
  question: z.string().max(4000),
});

export const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export type EnvConfig = z.infer<typeof envSchema>;
export type MatchMode = z.infer<typeof matchModeSchema>;
export type AskInput = z.infer<typeof askInputSchema>;
export type ChatCompletion = z.infer<typeof chatCompletionSchema>;
