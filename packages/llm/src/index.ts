export {
  DEFAULT_MODEL,
  resolveAnthropicApiKey,
  resolveModel,
  runChatCompletion,
  runLLMRequest,
} from "./anthropic"
export type { ChatRequest, ChatTurn, LLMRequest } from "./anthropic"
export { PatientChatSession } from "./chat"
export type { ChatCompletion } from "./chat"

// Versioned prompt management
export * as prompts from "./prompts"
