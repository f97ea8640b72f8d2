export {
  type GenerateContentClient,
  type GeminiSummarizerOptions,
  createGeminiSummarizer,
  buildSummaryPrompt,
  stripCodeFences,
} from "./gemini.js";
