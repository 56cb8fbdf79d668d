import { config as loadEnv } from "dotenv"
import { toPipelineError } from "@pipeline-errors"
import { debugError } from "@storage/debug-logger"
import { resolveVisitConfig } from "@visit-session"
import { parseCommandLine } from "./args"
import { COMMANDS, USAGE, createAppContext } from "./commands"

loadEnv()

async function main(argv: readonly string[]): Promise<number> {
  const line = parseCommandLine(argv)
  if (!line.command || line.values.help === true) {
    console.log(USAGE)
    return line.command ? 0 : 1
  }

  const command = COMMANDS[line.command]
  if (!command) {
    console.error(`Unknown command "${line.command}"\n`)
    console.error(USAGE)
    return 1
  }

  const ctx = await createAppContext(resolveVisitConfig())
  try {
    await command(ctx, line)
    return 0
  } finally {
    ctx.db.close()
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    const pipelineError = toPipelineError(error, {
      code: "storage_error",
      message: "Unexpected failure",
      recoverable: false,
    })
    console.error(`Error [${pipelineError.code}]: ${pipelineError.message}`)
    debugError(error)
    process.exitCode = 1
  },
)
