import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { getSupabaseUrl, getServerPooledOptions } from "./config";

/**
 * True when both SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are set
 */
export function isSupabaseConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(getSupabaseUrl(env) && env.SUPABASE_SERVICE_ROLE_KEY);
}

let cachedClient: SupabaseClient | null = null;

/**
 * Creates a Supabase client using the service role key with connection pooling.
 * Server-side only: the service role bypasses RLS.
 *
 * @see lib/supabase/config.ts for the pooling environment variables
 */
export function getServiceSupabase(): SupabaseClient {
  if (cachedClient) return cachedClient;

  const url = getSupabaseUrl();
  const serviceKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

  if (!url) {
    throw new Error("Missing SUPABASE_URL environment variable");
  }
  if (!serviceKey) {
    throw new Error("Missing SUPABASE_SERVICE_ROLE_KEY environment variable");
  }

  cachedClient = createClient(url, serviceKey, getServerPooledOptions());
  return cachedClient;
}
