/**
 * Domain Errors
 *
 * Every failure the core raises on purpose carries a stable `code` so callers
 * (HTTP handlers, the chat store, the CLI) can branch without string matching.
 */

export type RagportErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "SOURCE_TYPE_UNSUPPORTED"
  | "LISTENER_BIND_FAILURE"
  | "MALFORMED_REQUEST"
  | "INFERENCE_UNAVAILABLE"
  | "KNOWLEDGE_BASE_NOT_FOUND";

export class RagportError extends Error {
  readonly code: RagportErrorCode;

  constructor(code: RagportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RagportError";
    this.code = code;
  }
}

/** File missing, network failure, or any other reason a source cannot be read */
export class SourceUnavailableError extends RagportError {
  readonly location: string;

  constructor(location: string, message: string, options?: { cause?: unknown }) {
    super("SOURCE_UNAVAILABLE", message, options);
    this.name = "SourceUnavailableError";
    this.location = location;
  }
}

export class SourceTypeUnsupportedError extends RagportError {
  readonly kind: string;

  constructor(kind: string) {
    super("SOURCE_TYPE_UNSUPPORTED", `No provider found for source type ${kind}`);
    this.name = "SourceTypeUnsupportedError";
    this.kind = kind;
  }
}

export class ListenerBindError extends RagportError {
  readonly port: number;

  constructor(port: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("LISTENER_BIND_FAILURE", `Failed to bind port ${port}: ${reason}`, { cause });
    this.name = "ListenerBindError";
    this.port = port;
  }
}

export class MalformedRequestError extends RagportError {
  constructor(message: string) {
    super("MALFORMED_REQUEST", message);
    this.name = "MalformedRequestError";
  }
}

export class InferenceUnavailableError extends RagportError {
  constructor(message = "No model loaded. Configure an inference model first.") {
    super("INFERENCE_UNAVAILABLE", message);
    this.name = "InferenceUnavailableError";
  }
}

export class KnowledgeBaseNotFoundError extends RagportError {
  constructor(id: string) {
    super("KNOWLEDGE_BASE_NOT_FOUND", `Knowledge base not found: ${id}`);
    this.name = "KnowledgeBaseNotFoundError";
  }
}

/**
 * Helper to extract error message safely
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "APIUserAbortError");
}
