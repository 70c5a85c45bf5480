export type { InferenceEngine, GenerateOptions } from "./types";
export { OpenAICompatibleEngine } from "./openai";
export { SerializedInferenceEngine } from "./serialized";
export { generateText, GENERATION_STOPPED_MARKER, type GenerateTextResult } from "./generate";
