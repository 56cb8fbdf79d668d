import Anthropic from "@anthropic-ai/sdk"
import { PipelineStageError } from "@pipeline-errors"

export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929"

export interface LLMRequest {
  system: string
  prompt: string
  model?: string
  apiKey?: string
  temperature?: number
  /**
   * JSON schema for structured output
   * Set to enable JSON mode with schema validation
   */
  jsonSchema?: {
    name: string
    description?: string
    schema: Record<string, unknown>
  }
}

export interface ChatTurn {
  role: "user" | "assistant"
  content: string
}

export interface ChatRequest {
  system: string
  messages: readonly ChatTurn[]
  model?: string
  apiKey?: string
  temperature?: number
}

export function resolveAnthropicApiKey(apiKey?: string): string {
  const key = apiKey || process.env.ANTHROPIC_API_KEY
  if (!key) {
    throw new PipelineStageError(
      "configuration_error",
      "ANTHROPIC_API_KEY environment variable is required. Please set it in your .env file or environment.",
      false,
    )
  }
  return key
}

export function resolveModel(model?: string): string {
  return model || process.env.ANTHROPIC_MODEL?.trim() || DEFAULT_MODEL
}

function extractText(message: Anthropic.Message): string {
  const textContent = message.content.find((block) => block.type === "text")
  if (!textContent || textContent.type !== "text") {
    throw new PipelineStageError("api_error", "No text content in Anthropic response", true)
  }
  return textContent.text
}

export async function runLLMRequest({
  system,
  prompt,
  model,
  apiKey,
  temperature,
  jsonSchema,
}: LLMRequest): Promise<string> {
  const client = new Anthropic({ apiKey: resolveAnthropicApiKey(apiKey) })

  const requestParams: Anthropic.MessageCreateParamsNonStreaming = {
    model: resolveModel(model),
    max_tokens: 4096,
    messages: [
      {
        role: "user",
        content: prompt,
      },
    ],
  }
  if (temperature !== undefined) {
    requestParams.temperature = temperature
  }

  if (jsonSchema) {
    // Structured output goes through a forced tool call that carries the schema
    requestParams.system = [
      {
        type: "text",
        text: system,
      },
    ]
    requestParams.tools = [
      {
        name: jsonSchema.name,
        description: jsonSchema.description ?? "Return the extracted data following this exact structure",
        input_schema: { ...jsonSchema.schema, type: "object" },
      },
    ]
    requestParams.tool_choice = {
      type: "tool",
      name: jsonSchema.name,
    }
  } else {
    requestParams.system = system
  }

  const message = await client.messages.create(requestParams)

  if (jsonSchema) {
    const toolUseBlock = message.content.find((block) => block.type === "tool_use")
    if (toolUseBlock && toolUseBlock.type === "tool_use") {
      return JSON.stringify(toolUseBlock.input, null, 2)
    }
  }

  return extractText(message)
}

export async function runChatCompletion({ system, messages, model, apiKey, temperature }: ChatRequest): Promise<string> {
  const client = new Anthropic({ apiKey: resolveAnthropicApiKey(apiKey) })

  const message = await client.messages.create({
    model: resolveModel(model),
    max_tokens: 2048,
    system,
    temperature: temperature ?? 0.5,
    messages: messages.map((turn) => ({ role: turn.role, content: turn.content })),
  })

  return extractText(message)
}
