import type { PatientRecord } from "@record-merge"
import { runChatCompletion, type ChatRequest, type ChatTurn } from "./anthropic"
import * as patientChat from "./prompts/patient-chat"

export type ChatCompletion = (request: ChatRequest) => Promise<string>

/**
 * Conversation with the assistant about one patient.
 * The record is re-sent as system context on every turn so answers follow the latest merge.
 */
export class PatientChatSession {
  private history: ChatTurn[] = []

  constructor(private readonly complete: ChatCompletion = runChatCompletion) {}

  async send(message: string, patient?: PatientRecord | null): Promise<string> {
    this.history.push({ role: "user", content: message })

    let reply: string
    try {
      reply = await this.complete({
        system: patientChat.currentVersion.getSystemPrompt(patient),
        messages: [...this.history],
      })
    } catch (error) {
      // Keep user/assistant turns alternating for the next request
      this.history.pop()
      throw error
    }

    if (reply) {
      this.history.push({ role: "assistant", content: reply })
    }
    return reply
  }

  getHistory(): readonly ChatTurn[] {
    return this.history
  }

  clear(): void {
    this.history = []
  }
}
