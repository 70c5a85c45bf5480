/**
 * Error Logging
 *
 * Classifies failures and records them in the `error_logs` table when a
 * Supabase project is configured. Without one, entries go to the console.
 */

import { RagportError, type RagportErrorCode } from "@/lib/errors";
import { getServiceSupabase, isSupabaseConfigured } from "@/lib/supabase/server";

export type ErrorType =
  | "api_error"
  | "database_error"
  | "validation_error"
  | "ingestion_error"
  | "inference_error"
  | "listener_error"
  | "network_error"
  | "timeout_error"
  | "rate_limit_error"
  | "unknown_error";

export type ErrorSeverity = "low" | "medium" | "high" | "critical";

export interface ErrorLogEntry {
  error_type: ErrorType;
  severity?: ErrorSeverity;
  /** Error class name, e.g. "TypeError" */
  error_name?: string;
  error_message: string;
  error_stack?: string;
  status_code?: number;
  url?: string;
  method?: string;
  knowledge_base_id?: string;
  source_id?: string;
  request_id?: string;
  metadata?: Record<string, unknown>;
  /** ISO timestamp */
  timestamp?: string;
}

export interface LogErrorResult {
  success: boolean;
  log_id?: string;
  error?: string;
}

const TYPE_BY_CODE: Record<RagportErrorCode, ErrorType> = {
  SOURCE_UNAVAILABLE: "ingestion_error",
  SOURCE_TYPE_UNSUPPORTED: "ingestion_error",
  LISTENER_BIND_FAILURE: "listener_error",
  MALFORMED_REQUEST: "validation_error",
  INFERENCE_UNAVAILABLE: "inference_error",
  KNOWLEDGE_BASE_NOT_FOUND: "validation_error",
};

// First match wins
const TYPE_BY_MESSAGE: ReadonlyArray<readonly [ErrorType, RegExp]> = [
  ["timeout_error", /timeout|etimedout|timed out/],
  ["network_error", /network|fetch failed|econnrefused|econnreset|enotfound/],
  ["rate_limit_error", /rate limit|too many requests|429/],
  ["database_error", /postgres|supabase|duplicate key|constraint/],
  ["validation_error", /invalid|required|missing/],
];

const BASE_SEVERITY: Partial<Record<ErrorType, ErrorSeverity>> = {
  database_error: "critical",
  listener_error: "critical",
  inference_error: "high",
  validation_error: "low",
};

export function classifyError(error: unknown): ErrorType {
  if (!error) return "unknown_error";
  if (error instanceof RagportError) return TYPE_BY_CODE[error.code];

  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  const match = TYPE_BY_MESSAGE.find(([, pattern]) => pattern.test(message));
  return match ? match[0] : "unknown_error";
}

/**
 * A 500 is always critical. A 503 raises anything below "high" to "high".
 */
export function determineSeverity(errorType: ErrorType, statusCode?: number): ErrorSeverity {
  if (statusCode === 500) return "critical";

  const severity = BASE_SEVERITY[errorType] ?? "medium";
  if (statusCode === 503 && (severity === "low" || severity === "medium")) {
    return "high";
  }
  return severity;
}

export async function logError(entry: ErrorLogEntry): Promise<LogErrorResult> {
  const severity = entry.severity ?? determineSeverity(entry.error_type, entry.status_code);

  if (!isSupabaseConfigured()) {
    console.error(`[error-logger] ${entry.error_type} (${severity}): ${entry.error_message}`);
    return { success: false, error: "Supabase not configured" };
  }

  const row = {
    error_type: entry.error_type,
    severity,
    name: entry.error_name ?? null,
    message: entry.error_message,
    stack: entry.error_stack ?? null,
    status_code: entry.status_code ?? null,
    url: entry.url ?? null,
    method: entry.method ?? null,
    knowledge_base_id: entry.knowledge_base_id ?? null,
    source_id: entry.source_id ?? null,
    request_id: entry.request_id ?? null,
    metadata: { ...entry.metadata, logged_at: entry.timestamp ?? new Date().toISOString() },
  };

  try {
    const { data, error } = await getServiceSupabase().from("error_logs").insert(row).select("id").single();
    if (error) {
      console.error("[error-logger] Failed to write to database:", error.message);
      return { success: false, error: error.message };
    }
    return { success: true, log_id: String(data.id) };
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    console.error("[error-logger] Exception while logging error:", message);
    return { success: false, error: message };
  }
}

/**
 * Log a caught value. An explicit `error_type` in the context wins over
 * classification. Never rejects, so callers may fire and forget:
 *
 * ```ts
 * void logErrorObject(error, { knowledge_base_id: kb.id, source_id: source.id });
 * ```
 */
export async function logErrorObject(
  error: unknown,
  context: Partial<Omit<ErrorLogEntry, "error_message" | "error_name" | "error_stack">> = {}
): Promise<LogErrorResult> {
  const details =
    error instanceof Error
      ? { error_message: error.message, error_name: error.name, error_stack: error.stack }
      : { error_message: String(error) };

  return logError({
    timestamp: new Date().toISOString(),
    ...context,
    ...details,
    error_type: context.error_type ?? classifyError(error),
  });
}
