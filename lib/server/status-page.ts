/**
 * Human-readable status page served at GET / of each running knowledge base
 */

import type { KnowledgeBase } from "@/lib/rag/types";

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export interface StatusPageInput {
  knowledgeBase: KnowledgeBase;
  port: number;
  requestCount: number;
}

export function renderStatusPage({ knowledgeBase, port, requestCount }: StatusPageInput): string {
  const name = escapeHtml(knowledgeBase.name);
  const enabled = knowledgeBase.sources.filter((source) => source.enabled);
  const sources =
    enabled.length > 0
      ? enabled.map((source) => `<li>${escapeHtml(source.name)} <small>(${source.kind})</small></li>`).join("")
      : `<li class="empty">No sources loaded</li>`;
  const baseUrl = `http://localhost:${port}`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${name} - ragport</title>
  <style>
    body { font-family: system-ui, sans-serif; max-width: 860px; margin: 40px auto; padding: 0 20px; color: #1f2937; }
    .badge { background: #10b981; color: #fff; padding: 2px 10px; border-radius: 12px; font-size: 0.8rem; }
    .card { border: 1px solid #e5e7eb; border-radius: 10px; padding: 20px; margin-bottom: 20px; }
    .empty { color: #9ca3af; font-style: italic; }
    pre { background: #f3f4f6; padding: 12px; border-radius: 6px; overflow-x: auto; }
  </style>
</head>
<body>
  <h1>${name} <span class="badge">Running</span></h1>
  <p><code>${baseUrl}</code></p>
  <div class="card">
    <h2>Configuration</h2>
    <p>Port: <strong>${port}</strong></p>
    <p>Requests served: <strong id="request-count">${requestCount}</strong></p>
    <p>System prompt:</p>
    <pre>${escapeHtml(knowledgeBase.systemPrompt)}</pre>
  </div>
  <div class="card">
    <h2>Sources</h2>
    <ul>${sources}</ul>
  </div>
  <div class="card">
    <h2>API</h2>
    <pre>curl -X POST ${baseUrl}/chat \\
  -H "Content-Type: application/json" \\
  -d '{"messages":[{"role":"user","content":"Hello!"}]}'</pre>
    <pre>curl -N -X POST ${baseUrl}/chat/stream \\
  -H "Content-Type: application/json" \\
  -d '{"messages":[{"role":"user","content":"Tell me a story."}]}'</pre>
  </div>
</body>
</html>
`;
}
