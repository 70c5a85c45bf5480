/**
 * Knowledge-base HTTP routes
 *
 * GET  /             status page
 * GET  /health       liveness probe
 * POST /chat         complete answer as JSON
 * POST /chat/stream  answer as SSE token frames, then [DONE]
 *
 * Paths match case-insensitively. Every response carries the CORS headers.
 */

import { createApiErrorResponse, jsonResponse, withErrorHandlingResponse } from "@/lib/api/errors";
import type { ChatResponseBody, PromptMessage } from "@/lib/chat/types";
import { InferenceUnavailableError, MalformedRequestError } from "@/lib/errors";
import { generateText } from "@/lib/inference/generate";
import type { InferenceEngine } from "@/lib/inference/types";
import type { RagEngine } from "@/lib/rag/engine";
import { buildPromptMessages } from "@/lib/rag/context";
import type { KnowledgeBase } from "@/lib/rag/types";
import type { FetchHandler } from "./http";
import { sseResponse } from "./sse";
import { renderStatusPage } from "./status-page";

/** Chunks retrieved per API request */
const API_MAX_CHUNKS = 5;

export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, Authorization",
} as const;

export interface RouteContext {
  knowledgeBase: () => KnowledgeBase;
  engine: RagEngine;
  inference: InferenceEngine;
  /** Reported as `model` by POST /chat */
  modelName: string;
  port: () => number;
  requestCount: () => number;
}

function withCors(response: Response): Response {
  for (const [key, value] of Object.entries(CORS_HEADERS)) {
    response.headers.set(key, value);
  }
  return response;
}

/**
 * Validate a chat request body and map roles: "user" stays user, every
 * other role becomes assistant.
 */
export function parseChatMessages(body: unknown): PromptMessage[] {
  if (typeof body !== "object" || body === null) {
    throw new MalformedRequestError("Request body must be a JSON object");
  }

  const messages: unknown = Reflect.get(body, "messages");
  if (!Array.isArray(messages) || messages.length === 0) {
    throw new MalformedRequestError("messages must be a non-empty array");
  }

  return messages.map((message, i): PromptMessage => {
    if (typeof message !== "object" || message === null) {
      throw new MalformedRequestError(`messages[${i}] must be an object`);
    }
    const role: unknown = Reflect.get(message, "role");
    const content: unknown = Reflect.get(message, "content");
    if (typeof content !== "string") {
      throw new MalformedRequestError(`messages[${i}].content must be a string`);
    }
    return { role: role === "user" ? "user" : "assistant", content };
  });
}

async function readChatRequest(request: Request): Promise<PromptMessage[]> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new MalformedRequestError("Request body is not valid JSON");
  }
  return parseChatMessages(body);
}

/**
 * Retrieve context for the last user message and prepend the configured
 * system prompt with the context folded in.
 */
export function preparePrompt(messages: PromptMessage[], ctx: RouteContext): PromptMessage[] {
  const lastUser = [...messages].reverse().find((message) => message.role === "user");
  const context = ctx.engine.getContext(lastUser?.content ?? "", API_MAX_CHUNKS);
  return buildPromptMessages(messages, context, ctx.knowledgeBase().systemPrompt);
}

function assertInferenceReady(inference: InferenceEngine): void {
  if (!inference.isReady()) {
    throw new InferenceUnavailableError();
  }
}

async function handleChat(request: Request, ctx: RouteContext): Promise<Response> {
  const messages = await readChatRequest(request);
  assertInferenceReady(ctx.inference);

  const { content } = await generateText(ctx.inference, preparePrompt(messages, ctx), {
    signal: request.signal,
  });

  const body: ChatResponseBody = {
    model: ctx.modelName,
    content,
    token_count: Math.floor(content.length / 4),
  };
  return jsonResponse(body);
}

async function handleChatStream(request: Request, ctx: RouteContext): Promise<Response> {
  const messages = await readChatRequest(request);
  assertInferenceReady(ctx.inference);
  const prompt = preparePrompt(messages, ctx);

  return sseResponse(
    async (write, signal) => {
      for await (const token of ctx.inference.stream(prompt, { signal })) {
        if (signal.aborted) break;
        write(JSON.stringify({ content: token }));
      }
    },
    { signal: request.signal }
  );
}

async function route(request: Request, ctx: RouteContext): Promise<Response> {
  const method = request.method.toUpperCase();
  const path = new URL(request.url).pathname.toLowerCase();

  if (method === "OPTIONS") {
    return new Response(null, { status: 200 });
  }

  if (path === "/" && method === "GET") {
    const html = renderStatusPage({
      knowledgeBase: ctx.knowledgeBase(),
      port: ctx.port(),
      requestCount: ctx.requestCount(),
    });
    return new Response(html, { headers: { "Content-Type": "text/html; charset=utf-8" } });
  }

  if (path === "/health") {
    return jsonResponse({ status: "ok", service: ctx.knowledgeBase().name });
  }

  if (path === "/chat" && method === "POST") {
    return handleChat(request, ctx);
  }

  if (path === "/chat/stream" && method === "POST") {
    return handleChatStream(request, ctx);
  }

  return createApiErrorResponse("NOT_FOUND", `No route for ${method} ${path}`);
}

/**
 * Build the request handler for one knowledge base. `onRequest` runs before
 * routing, for every request.
 */
export function createKnowledgeBaseHandler(ctx: RouteContext, onRequest?: () => void): FetchHandler {
  const handle = withErrorHandlingResponse(
    (request: Request) => route(request, ctx),
    `raas:${ctx.knowledgeBase().id}`
  );

  return async (request) => {
    onRequest?.();
    return withCors(await handle(request));
  };
}
