/**
 * In-app chat session
 *
 * A vanilla zustand store: one conversation against the shared inference
 * engine, with optional retrieval from the global engine or a running
 * knowledge base, an attached document and web results.
 */

import path from "path";
import { createStore } from "zustand/vanilla";
import { getErrorMessage } from "@/lib/errors";
import { generateText } from "@/lib/inference/generate";
import type { InferenceEngine } from "@/lib/inference/types";
import { assembleContext, buildPromptMessages, DEFAULT_SYSTEM_PROMPT, MAX_SESSION_DOCUMENT_CHARS } from "@/lib/rag/context";
import type { RagEngine } from "@/lib/rag/engine";
import type { KnowledgeBaseServer } from "@/lib/server/knowledge-base-server";
import { FileSourceProvider } from "@/lib/sources/file";
import type { WebSearchProvider, WebSearchResult } from "@/lib/web/search";
import type { ChatMessage, PromptMessage } from "./types";

/** Chunks retrieved per in-app turn */
const CHAT_MAX_CHUNKS = 3;

export const NO_MODEL_MESSAGE = "Please load a model first.";

export const KNOWLEDGE_BASE_NOT_RUNNING_NOTICE =
  "[System: The selected knowledge base is not running. Answer based on general knowledge only.]";

export type KnowledgeBaseSelection =
  | { kind: "none" }
  | { kind: "global" }
  | { kind: "service"; id: string };

export interface AttachedDocument {
  name: string;
  content: string;
}

export interface ChatStoreDeps {
  inference: InferenceEngine;
  /** Engine behind the "global" selection */
  globalEngine?: RagEngine;
  /** Lookup for running knowledge bases */
  getServer?: (id: string) => KnowledgeBaseServer | undefined;
  webSearch?: WebSearchProvider;
  /** Reads an attached file to text (default: the file source provider) */
  readDocument?: (filePath: string) => Promise<string>;
  /** Outer cap on assembled context, in characters */
  contextCharBudget?: number;
}

export interface ChatState {
  messages: ChatMessage[];
  systemPrompt: string;
  isGenerating: boolean;
  abortController: AbortController | null;
  attachedDocument: AttachedDocument | null;
  selectedKnowledgeBase: KnowledgeBaseSelection;
  webSearchEnabled: boolean;

  sendMessage: (content: string) => Promise<void>;
  stopGeneration: () => void;
  attachDocument: (filePath: string) => Promise<AttachedDocument>;
  removeDocument: () => void;
  selectKnowledgeBase: (selection: KnowledgeBaseSelection) => void;
  setWebSearchEnabled: (enabled: boolean) => void;
  setSystemPrompt: (prompt: string) => void;
  clearChat: () => void;

  // Internal helpers
  appendMessage: (message: ChatMessage) => void;
  updateMessage: (messageId: string, updates: Partial<ChatMessage>) => void;
}

let messageSeq = 0;

function nextMessageId(role: ChatMessage["role"]): string {
  messageSeq++;
  return `msg-${Date.now()}-${messageSeq}-${role}`;
}

export function createChatStore(deps: ChatStoreDeps) {
  const readDocument = deps.readDocument ?? ((filePath: string) => new FileSourceProvider().readFile(filePath));

  /**
   * Retrieval context for the current selection
   */
  function resolveKnowledgeBaseContext(selection: KnowledgeBaseSelection, query: string): string {
    switch (selection.kind) {
      case "none":
        return "";
      case "global":
        return deps.globalEngine?.getContext(query, CHAT_MAX_CHUNKS) ?? "";
      case "service": {
        const server = deps.getServer?.(selection.id);
        return server ? server.engine.getContext(query, CHAT_MAX_CHUNKS) : KNOWLEDGE_BASE_NOT_RUNNING_NOTICE;
      }
    }
  }

  return createStore<ChatState>()((set, get) => ({
    messages: [],
    systemPrompt: DEFAULT_SYSTEM_PROMPT,
    isGenerating: false,
    abortController: null,
    attachedDocument: null,
    selectedKnowledgeBase: { kind: "none" },
    webSearchEnabled: false,

    appendMessage: (message) =>
      set((state) => ({ messages: [...state.messages, message] })),

    updateMessage: (messageId, updates) =>
      set((state) => ({
        messages: state.messages.map((msg) => (msg.id === messageId ? { ...msg, ...updates } : msg)),
      })),

    sendMessage: async (content) => {
      const { appendMessage, updateMessage, isGenerating } = get();
      if (content.trim().length === 0 || isGenerating) return;

      if (!deps.inference.isReady()) {
        appendMessage({
          id: nextMessageId("assistant"),
          role: "assistant",
          content: NO_MODEL_MESSAGE,
          timestamp: new Date(),
        });
        return;
      }

      appendMessage({ id: nextMessageId("user"), role: "user", content, timestamp: new Date() });

      const abortController = new AbortController();
      set({ isGenerating: true, abortController });

      const assistantMessageId = nextMessageId("assistant");
      const history: PromptMessage[] = [];
      const { systemPrompt, selectedKnowledgeBase, attachedDocument, webSearchEnabled } = get();
      if (systemPrompt.trim()) {
        history.push({ role: "system", content: systemPrompt });
      }
      for (const message of get().messages) {
        history.push({ role: message.role, content: message.content });
      }

      appendMessage({
        id: assistantMessageId,
        role: "assistant",
        content: "",
        timestamp: new Date(),
        isStreaming: true,
      });

      let streamedContent = "";

      try {
        const knowledgeBaseContext = resolveKnowledgeBaseContext(selectedKnowledgeBase, content);

        let webResults: WebSearchResult[] = [];
        if (webSearchEnabled && deps.webSearch) {
          webResults = await deps.webSearch.search(content, 5, abortController.signal);
        }

        const context = assembleContext({
          sessionDocument: attachedDocument ?? undefined,
          knowledgeBaseContext,
          webResults,
          maxChars: deps.contextCharBudget,
        });

        const result = await generateText(deps.inference, buildPromptMessages(history, context), {
          signal: abortController.signal,
          onToken: (token) => {
            streamedContent += token;
            updateMessage(assistantMessageId, { content: streamedContent });
          },
        });

        updateMessage(assistantMessageId, { content: result.content });
      } catch (err) {
        console.error("[chat] Generation failed:", getErrorMessage(err));
        updateMessage(assistantMessageId, { content: `Error: ${getErrorMessage(err)}` });
      } finally {
        updateMessage(assistantMessageId, { isStreaming: false });
        set({ isGenerating: false, abortController: null });
      }
    },

    stopGeneration: () => {
      get().abortController?.abort();
    },

    attachDocument: async (filePath) => {
      const text = await readDocument(filePath);
      const document: AttachedDocument = {
        name: path.basename(filePath),
        content: text.slice(0, MAX_SESSION_DOCUMENT_CHARS),
      };
      set({ attachedDocument: document });
      return document;
    },

    removeDocument: () => set({ attachedDocument: null }),

    selectKnowledgeBase: (selection) => set({ selectedKnowledgeBase: selection }),

    setWebSearchEnabled: (enabled) => set({ webSearchEnabled: enabled }),

    setSystemPrompt: (prompt) => set({ systemPrompt: prompt }),

    clearChat: () => {
      get().abortController?.abort();
      set({ messages: [] });
    },
  }));
}

export type ChatStore = ReturnType<typeof createChatStore>;
