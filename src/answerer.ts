import crypto from "node:crypto";
import { buildPrompt } from "./prompt";
import type { ProductRecord } from "./catalog";
import type { ResponseCache } from "./cache";
import type { Generate, GenerationResult } from "./llm";

export const FAILURE_PREFIX = "Ocurrió un error al procesar tu solicitud";

/**
 * SHA-256 over the record's fields (sorted by name) and the exact question.
 * Field order in the source CSV does not affect the key; any change in a value does.
 */
export function cacheKey(record: ProductRecord, question: string): string {
  const fields = Object.keys(record)
    .sort()
    .map((field) => [field, record[field]]);
  return crypto.createHash("sha256").update(JSON.stringify([fields, question])).digest("hex");
}

export function failureMessage(cause: string): string {
  return `${FAILURE_PREFIX}: ${cause}`;
}

/**
 * Answers product questions, calling the backend at most once per distinct
 * (record, question). Failures come back as text and are never cached.
 */
export class CachedAnswerer {
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(
    private readonly cache: ResponseCache,
    private readonly generate: Generate,
  ) {}

  answer(record: ProductRecord, question: string, requestId?: string): Promise<string> {
    const key = cacheKey(record, question);

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const run = this.generateAndStore(key, record, question, requestId).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  private async generateAndStore(
    key: string,
    record: ProductRecord,
    question: string,
    requestId?: string,
  ): Promise<string> {
    let result: GenerationResult;
    try {
      result = await this.generate(buildPrompt(record, question));
    } catch (error) {
      result = { ok: false, cause: error instanceof Error ? error.message : String(error), transient: false };
    }

    if (!result.ok) {
      console.error("LLM_ERR", { request_id: requestId, cause: result.cause });
      return failureMessage(result.cause);
    }

    const text = result.text.trim();
    if (!text) {
      return failureMessage("empty response from language model");
    }
    this.cache.put(key, text);
    return text;
  }
}
