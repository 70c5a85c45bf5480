#!/usr/bin/env tsx
/**
 * Host knowledge bases over HTTP.
 *
 * Usage:
 *   npx tsx scripts/serve.ts                 # start every saved knowledge base
 *   npx tsx scripts/serve.ts <id> [<id>...]  # start only these
 *   npx tsx scripts/serve.ts --name Docs --port 5001 --file ./notes.md --url https://example.com
 *
 * The --name/--port/--file/--url/--text flags create a new knowledge base
 * first and start it along with the others.
 *
 * Requires:
 *   - OPENAI_MODEL plus OPENAI_API_KEY or OPENAI_BASE_URL for chat
 *   - SUPABASE_URL + SUPABASE_SERVICE_ROLE_KEY to persist knowledge bases (optional)
 */

import { config } from "dotenv";
config(); // Load .env file

import { parseArgs } from "util";
import { getAppConfig } from "@/lib/config";
import { getErrorMessage } from "@/lib/errors";
import { OpenAICompatibleEngine, SerializedInferenceEngine } from "@/lib/inference";
import { KnowledgeBaseManager } from "@/lib/raas";
import { createDefaultRegistry } from "@/lib/sources";
import { createKnowledgeBaseStore } from "@/lib/store";

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      name: { type: "string" },
      port: { type: "string" },
      prompt: { type: "string" },
      file: { type: "string", multiple: true },
      url: { type: "string", multiple: true },
      text: { type: "string", multiple: true },
    },
  });

  const appConfig = getAppConfig();
  const inference = new SerializedInferenceEngine(new OpenAICompatibleEngine(appConfig.inference));
  if (!inference.isReady()) {
    console.warn("[serve] No model configured; /chat will answer 503 until OPENAI_MODEL is set");
  }

  const manager = new KnowledgeBaseManager({
    store: createKnowledgeBaseStore(),
    inference,
    registry: createDefaultRegistry(appConfig.web),
    config: appConfig.raas,
  });
  await manager.initialize();

  const ids = [...positionals];

  const wantsNew =
    values.name !== undefined ||
    values.file !== undefined ||
    values.url !== undefined ||
    values.text !== undefined;

  if (wantsNew) {
    const kb = await manager.create({
      name: values.name,
      port: values.port !== undefined ? Number(values.port) : undefined,
      systemPrompt: values.prompt,
    });
    for (const file of values.file ?? []) {
      await manager.addFileSource(kb.id, file);
    }
    for (const url of values.url ?? []) {
      await manager.addWebSource(kb.id, url);
    }
    for (const [i, text] of (values.text ?? []).entries()) {
      await manager.addTextSource(kb.id, `Text ${i + 1}`, text);
    }
    console.log(`[serve] Created knowledge base "${kb.name}" (${kb.id})`);
    ids.push(kb.id);
  }

  const targets = ids.length > 0 ? [...new Set(ids)] : manager.list().map((kb) => kb.id);
  if (targets.length === 0) {
    console.error("No knowledge bases to serve. Create one with --name/--file/--url/--text.");
    process.exit(1);
  }

  let started = 0;
  for (const id of targets) {
    try {
      const server = await manager.start(id);
      const kb = manager.get(id);
      console.log(`[serve] ${kb?.name ?? id} listening on http://${appConfig.raas.host}:${server.port}`);
      started++;
    } catch (error) {
      console.error(`[serve] Failed to start ${id}: ${getErrorMessage(error)}`);
    }
  }

  if (started === 0) {
    process.exit(1);
  }

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n[serve] ${signal} received, stopping knowledge bases...`);
    manager
      .stopAll()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("[serve] Shutdown failed:", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("[serve] Fatal:", error);
  process.exit(1);
});
