#!/usr/bin/env tsx
/**
 * Interactive chat in the terminal.
 *
 * Usage:
 *   npx tsx scripts/chat.ts
 *   npx tsx scripts/chat.ts --file ./handbook.pdf --file ./notes.md
 *
 * Files passed with --file form the global knowledge base the chat answers from.
 *
 * Commands:
 *   /attach <path>   attach a document to this session
 *   /detach          drop the attached document
 *   /web on|off      toggle web search (needs TAVILY_API_KEY)
 *   /clear           forget the conversation
 *   /exit            quit
 *
 * Ctrl+C while an answer streams stops it; otherwise it quits.
 */

import { config } from "dotenv";
config(); // Load .env file

import path from "path";
import { randomUUID } from "crypto";
import { createInterface } from "readline/promises";
import { parseArgs } from "util";
import { createChatStore } from "@/lib/chat/chat-store";
import { getAppConfig, getContextCharBudget } from "@/lib/config";
import { getErrorMessage } from "@/lib/errors";
import { OpenAICompatibleEngine } from "@/lib/inference";
import { RagEngine, type Source } from "@/lib/rag";
import { createDefaultRegistry } from "@/lib/sources";
import { TavilyWebSearch } from "@/lib/web/search";

async function buildGlobalEngine(files: readonly string[], appConfig: ReturnType<typeof getAppConfig>) {
  if (files.length === 0) return undefined;

  const engine = new RagEngine({ registry: createDefaultRegistry(appConfig.web), label: "global" });
  const sources: Source[] = files.map((file) => ({
    id: randomUUID(),
    kind: "file",
    name: path.basename(file),
    value: path.resolve(file),
    enabled: true,
    metadata: {},
  }));

  const report = await engine.ingestSources(sources);
  console.log(`[chat] Loaded ${report.ingested.length} document(s) into the global knowledge base`);
  for (const failure of report.failed) {
    console.warn(`[chat] Skipped ${failure.source.name}: ${getErrorMessage(failure.error)}`);
  }
  return engine;
}

async function main() {
  const { values } = parseArgs({
    options: {
      file: { type: "string", multiple: true },
    },
  });

  const appConfig = getAppConfig();
  const inference = new OpenAICompatibleEngine(appConfig.inference);
  const globalEngine = await buildGlobalEngine(values.file ?? [], appConfig);

  const store = createChatStore({
    inference,
    globalEngine,
    webSearch: new TavilyWebSearch({ apiKey: appConfig.web.tavilyApiKey }),
    contextCharBudget: getContextCharBudget(appConfig.inference),
  });
  if (globalEngine) {
    store.getState().selectKnowledgeBase({ kind: "global" });
  }

  // Print the assistant reply as it grows
  let printed = 0;
  store.subscribe((state) => {
    const last = state.messages[state.messages.length - 1];
    if (!last || last.role !== "assistant") return;
    if (last.content.length > printed) {
      process.stdout.write(last.content.slice(printed));
      printed = last.content.length;
    }
  });

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.on("SIGINT", () => {
    if (store.getState().isGenerating) {
      store.getState().stopGeneration();
      return;
    }
    rl.close();
  });

  console.log(`Model: ${inference.isReady() ? inference.model : "(none)"}. Type /exit to quit.`);

  for (;;) {
    let line: string;
    try {
      line = (await rl.question("\n> ")).trim();
    } catch {
      // readline rejects once closed
      break;
    }
    if (!line) continue;

    if (line === "/exit") break;
    if (line === "/clear") {
      store.getState().clearChat();
      console.log("[chat] Conversation cleared");
      continue;
    }
    if (line === "/detach") {
      store.getState().removeDocument();
      continue;
    }
    if (line.startsWith("/web ")) {
      const enabled = line.slice(5).trim() === "on";
      store.getState().setWebSearchEnabled(enabled);
      console.log(`[chat] Web search ${enabled ? "on" : "off"}`);
      continue;
    }
    if (line.startsWith("/attach ")) {
      try {
        const document = await store.getState().attachDocument(line.slice(8).trim());
        console.log(`[chat] Attached ${document.name} (${document.content.length} chars)`);
      } catch (error) {
        console.error(`[chat] Attach failed: ${getErrorMessage(error)}`);
      }
      continue;
    }

    printed = 0;
    await store.getState().sendMessage(line);
    process.stdout.write("\n");
  }

  rl.close();
}

main().catch((error: unknown) => {
  console.error("[chat] Fatal:", error);
  process.exit(1);
});
