import "dotenv/config";
import { createApp } from "./app";
import { CachedAnswerer } from "./answerer";
import { ProductAssistant } from "./assistant";
import { InMemoryResponseCache } from "./cache";
import { CatalogStore } from "./catalog";
import { LoadError } from "./errors";
import { createOpenAiGenerator } from "./llm";
import { InMemorySessionStore } from "./state";
import { envSchema } from "./validators";

const parsedEnv = envSchema.safeParse(process.env);
if (!parsedEnv.success) {
  console.error("Invalid environment variables", parsedEnv.error.format());
  process.exit(1);
}

const env = parsedEnv.data;

const catalog = new CatalogStore();
const answerer = new CachedAnswerer(
  new InMemoryResponseCache(env.CACHE_MAX_ENTRIES),
  createOpenAiGenerator({
    apiKey: env.OPENAI_API_KEY,
    model: env.MODEL_NAME,
    maxOutputTokens: env.MAX_OUTPUT_TOKENS,
    temperature: env.TEMPERATURE,
    timeoutMs: env.LLM_TIMEOUT_MS,
    maxRetries: env.LLM_MAX_RETRIES,
  }),
);

const sessions = new InMemorySessionStore(env.HISTORY_LIMIT);

const app = createApp({
  catalog,
  sessions,
  assistant: new ProductAssistant({ catalog, sessions, answerer, matchMode: env.MATCH_MODE }),
});

async function loadDefaultCatalog(): Promise<void> {
  try {
    const loaded = await catalog.loadFile(env.CATALOG_PATH);
    console.log("CATALOG_LOADED", { source: loaded.source, count: loaded.records.length });
  } catch (error) {
    if (!(error instanceof LoadError)) throw error;
    console.warn("CATALOG_ERR", { source: env.CATALOG_PATH, message: error.message });
  }
}

loadDefaultCatalog()
  .then(() => {
    app.listen(env.PORT, () => {
      console.log(
        `Server listening on :${env.PORT} model=${env.MODEL_NAME} match_mode=${env.MATCH_MODE} history_limit=${env.HISTORY_LIMIT}`,
      );
    });
  })
  .catch((error) => {
    console.error("STARTUP_ERR", { stack: error instanceof Error ? error.stack : String(error) });
    process.exit(1);
  });
