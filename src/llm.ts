import axios from "axios";
import { chatCompletionSchema } from "./validators";
import type { PromptContext } from "./prompt";

export type GenerationResult = { ok: true; text: string } | { ok: false; cause: string; transient: boolean };

/** Turns a prompt into a generation result. */
export type Generate = (prompt: PromptContext) => Promise<GenerationResult>;

export interface LlmSettings {
  apiKey: string;
  model: string;
  maxOutputTokens: number;
  temperature: number;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

interface LlmCallParams extends LlmSettings {
  prompt: PromptContext;
}

const COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`LLM timeout after ${timeoutMs}ms`)), timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function apiErrorMessage(data: unknown): string | null {
  if (typeof data !== "object" || data === null || !("error" in data)) return null;
  const { error } = data;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return null;
}

export function describeFailure(error: unknown): { cause: string; transient: boolean } {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      const detail = apiErrorMessage(error.response?.data) ?? error.message;
      return { cause: `HTTP ${status}: ${detail}`, transient: status === 429 || status >= 500 };
    }
    return { cause: error.code ? `${error.code}: ${error.message}` : error.message, transient: true };
  }

  if (error instanceof Error) {
    return { cause: error.message, transient: error.message.startsWith("LLM timeout") };
  }
  return { cause: String(error), transient: false };
}

async function requestCompletion(params: LlmCallParams): Promise<GenerationResult> {
  const timeoutMs = params.timeoutMs ?? 15000;

  try {
    const request = axios.post(
      COMPLETIONS_URL,
      {
        model: params.model,
        messages: [
          { role: "system", content: params.prompt.systemInstruction },
          { role: "user", content: params.prompt.userPrompt },
        ],
        max_tokens: params.maxOutputTokens,
        temperature: params.temperature,
      },
      {
        headers: {
          Authorization: `Bearer ${params.apiKey}`,
          "Content-Type": "application/json",
        },
        timeout: timeoutMs,
      },
    );

    const response = await withTimeout(request, timeoutMs + 100);

    const parsed = chatCompletionSchema.safeParse(response.data);
    if (!parsed.success) {
      return { ok: false, cause: "malformed response from language model", transient: false };
    }

    const text = parsed.data.choices[0].message.content?.trim();
    if (!text) {
      return { ok: false, cause: "empty response from language model", transient: false };
    }
    return { ok: true, text };
  } catch (error) {
    return { ok: false, ...describeFailure(error) };
  }
}

/** Calls the chat-completions API, retrying transient failures up to maxRetries times. */
export async function generateAnswer(params: LlmCallParams): Promise<GenerationResult> {
  const maxRetries = params.maxRetries ?? 1;
  const retryDelayMs = params.retryDelayMs ?? 500;

  let result = await requestCompletion(params);
  for (let attempt = 1; attempt <= maxRetries && !result.ok && result.transient; attempt += 1) {
    console.warn("LLM_RETRY", { attempt, cause: result.cause });
    await sleep(retryDelayMs * attempt);
    result = await requestCompletion(params);
  }
  return result;
}

export function createOpenAiGenerator(settings: LlmSettings): Generate {
  return (prompt) => generateAnswer({ ...settings, prompt });
}
