import React from "react"
import { render } from "ink"
import { CommanderError } from "commander"
import { parseArgs, type CliArgs, type RunArgs } from "./lib/args"
import { loadLocalEnv } from "./lib/env"
import { errorMessage } from "./lib/errors"
import { loadSettings, type Settings } from "./config/settings"
import { assertCredentials, logRunOutcome, type RunOutcome } from "./commands/run"
import { evalCommand } from "./commands/evaluate"
import { isomorphCommand } from "./commands/isomorph"
import { gapCommand } from "./commands/gap"
import { RunApp } from "./ui/RunApp"

async function runWithUi(args: RunArgs, settings: Settings): Promise<number> {
  assertCredentials(args.models, settings)

  let outcome: RunOutcome | undefined
  const app = render(
    <RunApp
      args={args}
      settings={settings}
      onFinish={(o) => {
        outcome = o
      }}
    />,
  )
  await app.waitUntilExit()

  if (!outcome) return 1
  logRunOutcome(outcome, args.outdir)
  return 0
}

async function main(argv: string[]): Promise<number> {
  loadLocalEnv()
  const settings = loadSettings()

  let args: CliArgs
  try {
    args = parseArgs(argv, settings)
  } catch (err) {
    // --help, --version and usage errors; commander has already printed them
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }

  switch (args.command) {
    case "run":
      return runWithUi(args, settings)
    case "eval":
      await evalCommand(args)
      return 0
    case "isomorph":
      await isomorphCommand(args)
      return 0
    case "gap":
      await gapCommand(args)
      return 0
  }
}

main(process.argv).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`)
    process.exitCode = 1
  },
)
