#!/usr/bin/env node

import { CliUsageError, getCliHelpText, parseCliOptions } from './cliOptions.js'
import { runCliPipeline } from './runPipeline.js'

const main = async (argv: readonly string[], cwd: string): Promise<number> => {
  const options = parseCliOptions(argv, cwd)

  if (options.help) {
    process.stdout.write(`${getCliHelpText()}\n`)
    return 0
  }

  return await runCliPipeline(options)
}

const describeFatalError = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error)
  }

  const message = `${error.name}: ${error.message}`
  return error instanceof CliUsageError ? `${message}\nRun relayci --help for usage.` : message
}

main(process.argv.slice(2), process.cwd()).then(
  (exitCode) => {
    process.exitCode = exitCode
  },
  (error: unknown) => {
    process.stderr.write(`${describeFatalError(error)}\n`)
    process.exitCode = 1
  }
)
