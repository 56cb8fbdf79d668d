import assert from "node:assert/strict"
import test from "node:test"
import { AuditLog } from "../audit-log.js"
import { openDatabase, IN_MEMORY } from "../database.js"

async function createAuditLog(): Promise<AuditLog> {
  const log = new AuditLog(await openDatabase(IN_MEMORY))
  log.initialize()
  return log
}

test("list returns the most recent entries first", async () => {
  const log = await createAuditLog()
  log.write({ event_type: "session.started", resource_id: "1", success: true })
  log.write({
    event_type: "record.merged",
    resource_id: "1",
    success: true,
    metadata: { fields: ["symptoms", "notes"], field_count: 2 },
  })

  const entries = log.list()
  assert.equal(entries.length, 2)
  assert.equal(entries[0]?.event_type, "record.merged")
  assert.deepEqual(entries[0]?.metadata, { fields: ["symptoms", "notes"], field_count: 2 })
  assert.equal(entries[0]?.success, true)
  assert.equal(entries[1]?.event_type, "session.started")
  assert.deepEqual(entries[1]?.metadata, {})
})

test("list filters by event type, resource and limit", async () => {
  const log = await createAuditLog()
  log.write({ event_type: "extraction.failed", resource_id: "2", success: false, error_message: "Bad JSON" })
  log.write({ event_type: "extraction.completed", resource_id: "3", success: true })
  log.write({ event_type: "extraction.failed", resource_id: "3", success: false })

  const failures = log.list({ event_type: "extraction.failed" })
  assert.deepEqual(
    failures.map((entry) => [entry.resource_id, entry.success, entry.error_message]),
    [
      ["3", false, null],
      ["2", false, "Bad JSON"],
    ],
  )
  assert.equal(log.list({ resource_id: "3" }).length, 2)
  assert.equal(log.list({ limit: 1 })[0]?.event_type, "extraction.failed")
})
