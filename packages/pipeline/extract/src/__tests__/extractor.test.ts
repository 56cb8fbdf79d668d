import assert from "node:assert/strict"
import { describe, it } from "node:test"
import { PipelineStageError } from "@pipeline-errors"
import type { LLMRequest } from "@llm"
import { extractJson, extractPatientFields, parseExtractedFields } from "../index.js"

function isExtractionError(error: unknown): boolean {
  return error instanceof PipelineStageError && error.code === "extraction_error" && error.recoverable
}

describe("extractJson", () => {
  it("returns bare JSON unchanged", () => {
    assert.equal(extractJson('  {"symptoms": "Cough"}  '), '{"symptoms": "Cough"}')
  })

  it("unwraps a fenced block", () => {
    assert.equal(extractJson('Here you go:\n```json\n{"symptoms": "Cough"}\n```'), '{"symptoms": "Cough"}')
  })

  it("slices the object out of surrounding prose", () => {
    assert.equal(extractJson('Result: {"notes": "ok"} Hope this helps.'), '{"notes": "ok"}')
  })

  it("throws an extraction error when there is no object", () => {
    assert.throws(() => extractJson("I could not find anything."), isExtractionError)
  })
})

describe("parseExtractedFields", () => {
  it("keeps strings and numbers, joins arrays and nulls blanks", () => {
    const fields = parseExtractedFields(
      JSON.stringify({
        age: 45,
        symptoms: ["Headache", " Fever ", ""],
        medications: "  Aspirin 81mg ",
        allergies: "   ",
        diagnosis: [],
        notes: null,
        follow_up_date: "2025-02-01",
      }),
    )

    assert.deepEqual(fields, {
      age: 45,
      symptoms: "Headache, Fever",
      medications: "Aspirin 81mg",
      allergies: null,
      diagnosis: null,
      notes: null,
      follow_up_date: "2025-02-01",
    })
  })

  it("drops keys outside the field vocabulary", () => {
    const fields = parseExtractedFields('{"symptoms": "Cough", "insurance_id": "X-1", "id": 9}')

    assert.deepEqual(fields, { symptoms: "Cough" })
  })

  it("rejects values of the wrong shape", () => {
    assert.throws(() => parseExtractedFields('{"symptoms": {"primary": "Cough"}}'), (error: unknown) => {
      return isExtractionError(error) && error instanceof PipelineStageError && error.message.endsWith("symptoms")
    })
  })

  it("rejects output that is not JSON", () => {
    assert.throws(() => parseExtractedFields("{symptoms: Cough}"), isExtractionError)
    assert.throws(() => parseExtractedFields("[1, 2]"), isExtractionError)
  })
})

describe("extractPatientFields", () => {
  it("returns an empty update without calling the model for a blank transcript", async () => {
    let calls = 0
    const fields = await extractPatientFields("   ", {
      runRequest: async () => {
        calls += 1
        return "{}"
      },
    })

    assert.deepEqual(fields, {})
    assert.equal(calls, 0)
  })

  it("sends the transcript with the field schema and parses the tool output", async () => {
    const requests: LLMRequest[] = []
    const fields = await extractPatientFields("Patient reports fever and a dry cough.", {
      runRequest: async (request) => {
        requests.push(request)
        return JSON.stringify({ symptoms: "Fever, Dry cough", notes: null })
      },
    })

    assert.deepEqual(fields, { symptoms: "Fever, Dry cough", notes: null })
    assert.equal(requests.length, 1)
    const [request] = requests
    assert.ok(request?.prompt.endsWith("Patient reports fever and a dry cough."))
    assert.equal(request?.jsonSchema?.name, "PatientFields")
    assert.equal(request?.temperature, 0)
  })

  it("propagates model failures", async () => {
    await assert.rejects(
      () =>
        extractPatientFields("Patient is here for a follow-up.", {
          runRequest: async () => {
            throw new PipelineStageError("api_error", "rate limited", true)
          },
        }),
      /rate limited/,
    )
  })
})
