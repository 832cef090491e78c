import { buildProgram } from "./cli.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("node")

buildProgram().parseAsync(process.argv).catch((err: unknown) => {
  log.error("command failed", { error: String(err) })
  process.exitCode = 1
})
