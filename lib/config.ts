/**
 * Application Configuration
 *
 * Reads runtime settings from environment variables. The CLI loads a `.env`
 * file with dotenv before anything here is called; library callers may pass
 * their own `env` object instead.
 */

import path from "path";

/**
 * Inference endpoint configuration (any OpenAI-compatible server)
 */
export interface InferenceConfig {
  /** API key (local servers usually accept any non-empty value) */
  apiKey?: string;
  /** Base URL of the chat completions API, e.g. http://127.0.0.1:8080/v1 */
  baseUrl?: string;
  /** Model name sent with each request; inference is unavailable without it */
  model?: string;
  /** Generation budget per turn (default: 256) */
  maxTokens: number;
  temperature: number;
  /** Context window of the loaded model in tokens (default: 8192) */
  contextWindowTokens: number;
}

/**
 * Knowledge-base hosting configuration
 */
export interface RaasConfig {
  /** Interface the per-knowledge-base listeners bind to (default: 127.0.0.1) */
  host: string;
  /** Root directory for managed copies of file sources */
  storageDir: string;
  /** Value reported as `model` by POST /chat */
  modelName: string;
  /** How long stop() waits for in-flight requests before closing sockets */
  stopGraceMs: number;
}

export type WebScraper = "fetch" | "firecrawl";

export interface WebConfig {
  scraper: WebScraper;
  firecrawlApiKey?: string;
  tavilyApiKey?: string;
}

export interface AppConfig {
  inference: InferenceConfig;
  raas: RaasConfig;
  web: WebConfig;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * Get application configuration from environment variables
 */
export function getAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const firecrawlApiKey = optional(env.FIRECRAWL_API_KEY);

  return {
    inference: {
      apiKey: optional(env.OPENAI_API_KEY),
      baseUrl: optional(env.OPENAI_BASE_URL),
      model: optional(env.OPENAI_MODEL),
      maxTokens: parseInteger(env.INFERENCE_MAX_TOKENS, 256),
      temperature: parseNumber(env.INFERENCE_TEMPERATURE, 0.7),
      contextWindowTokens: parseInteger(env.CONTEXT_WINDOW_TOKENS, 8192),
    },
    raas: {
      host: optional(env.RAAS_HOST) ?? "127.0.0.1",
      storageDir: path.resolve(optional(env.RAAS_STORAGE_DIR) ?? path.join("data", "raas")),
      modelName: optional(env.RAAS_MODEL_NAME) ?? "ragport-raas",
      stopGraceMs: parseInteger(env.RAAS_STOP_GRACE_MS, 5000),
    },
    web: {
      // Firecrawl only takes over when it is both requested and has a key
      scraper: env.WEB_SCRAPER === "firecrawl" && firecrawlApiKey ? "firecrawl" : "fetch",
      firecrawlApiKey,
      tavilyApiKey: optional(env.TAVILY_API_KEY),
    },
  };
}

/**
 * Character budget for assembled context: the model's window minus the
 * generation budget, at roughly 4 characters per token.
 */
export function getContextCharBudget(config: InferenceConfig): number {
  return Math.max(0, (config.contextWindowTokens - config.maxTokens) * 4);
}
