/**
 * Supabase Connection Pooling Configuration
 *
 * Supabase sits behind Supavisor; the knobs here are the client-side half:
 * which URL to hit, request timeout, HTTP keepalive and retry budget.
 *
 * @see https://supabase.com/docs/guides/database/connecting-to-postgres#connection-pooler
 */

import type { SupabaseClientOptions } from "@supabase/supabase-js";

/**
 * Connection pooling configuration from environment
 */
export interface PoolingConfig {
  /** Use the pooler URL instead of direct connection */
  usePooler: boolean;
  poolerUrl?: string;
  /** Request timeout in milliseconds */
  requestTimeout: number;
  /** Enable fetch keepalive for connection reuse */
  keepAlive: boolean;
  /** Maximum number of retries for failed requests */
  maxRetries: number;
}

/**
 * Get connection pooling configuration from environment variables
 */
export function getPoolingConfig(env: NodeJS.ProcessEnv = process.env): PoolingConfig {
  return {
    usePooler: env.SUPABASE_USE_POOLER === "true",
    poolerUrl: env.SUPABASE_POOLER_URL,
    requestTimeout: parseInt(env.SUPABASE_REQUEST_TIMEOUT || "30000", 10),
    keepAlive: env.SUPABASE_KEEP_ALIVE !== "false", // Default true
    maxRetries: parseInt(env.SUPABASE_MAX_RETRIES || "3", 10),
  };
}

/**
 * Supabase URL to connect to, or undefined when no project is configured.
 * SUPABASE_POOLER_URL wins when pooling is switched on.
 */
export function getSupabaseUrl(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const config = getPoolingConfig(env);
  const standardUrl = env.SUPABASE_URL;

  if (!standardUrl) {
    return undefined;
  }

  if (config.usePooler && config.poolerUrl) {
    return config.poolerUrl;
  }

  return standardUrl;
}

function createFetchWithKeepalive(config: PoolingConfig): typeof fetch {
  return (input: Parameters<typeof fetch>[0], init?: RequestInit) => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.requestTimeout);

    const fetchInit: RequestInit = {
      ...init,
      signal: controller.signal,
      keepalive: config.keepAlive,
    };

    return fetch(input, fetchInit).finally(() => clearTimeout(timeoutId));
  };
}

/**
 * Client options for the server process: no session handling, pooled fetch
 */
export function getServerPooledOptions(
  env: NodeJS.ProcessEnv = process.env
): SupabaseClientOptions<"public"> {
  const config = getPoolingConfig(env);

  return {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
    global: {
      fetch: createFetchWithKeepalive(config),
      headers: {
        "X-Client-Info": `ragport/${env.npm_package_version || "0.1.0"}`,
      },
    },
  };
}
