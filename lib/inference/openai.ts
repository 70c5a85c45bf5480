/**
 * OpenAI-compatible inference engine
 *
 * Works against the OpenAI API or any local server speaking the same chat
 * completions protocol (llama.cpp server, Ollama, LM Studio).
 */

import OpenAI from "openai";
import type { InferenceConfig } from "@/lib/config";
import type { PromptMessage } from "@/lib/chat/types";
import type { GenerateOptions, InferenceEngine } from "./types";

function toOpenAIMessage(message: PromptMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export class OpenAICompatibleEngine implements InferenceEngine {
  readonly model: string;
  private readonly client: OpenAI | null;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(config: InferenceConfig, client?: OpenAI) {
    this.model = config.model ?? "";
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;

    if (client) {
      this.client = client;
    } else if (config.model && (config.apiKey || config.baseUrl)) {
      // Local servers ignore the key but the SDK requires one
      this.client = new OpenAI({ apiKey: config.apiKey ?? "local", baseURL: config.baseUrl });
    } else {
      this.client = null;
    }
  }

  isReady(): boolean {
    return this.client !== null && this.model !== "";
  }

  async *stream(messages: readonly PromptMessage[], options: GenerateOptions = {}): AsyncIterable<string> {
    if (!this.client || !this.model) {
      return;
    }

    const stream = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: messages.map(toOpenAIMessage),
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        stream: true,
      },
      { signal: options.signal }
    );

    for await (const chunk of stream) {
      const token = chunk.choices[0]?.delta?.content;
      if (token) {
        yield token;
      }
    }
  }
}
