import React, { useEffect } from "react"
import { Box, useApp } from "ink"
import type { RunArgs } from "../lib/args"
import type { Settings } from "../config/settings"
import type { RunOutcome } from "../commands/run"
import { useModelRun } from "../hooks/useModelRun"
import { Header } from "./components/Header"
import { ConfigInfo } from "./components/ConfigInfo"
import { StatusInfo } from "./components/StatusInfo"
import { ModelList } from "./components/ModelList"

interface RunAppProps {
  args: RunArgs
  settings: Settings
  onFinish: (outcome: RunOutcome) => void
}

export function RunApp({ args, settings, onFinish }: RunAppProps) {
  const state = useModelRun(args, settings)
  const { exit } = useApp()

  useEffect(() => {
    if (!state.done) return
    if (state.outcome) onFinish(state.outcome)
    exit(state.error ? new Error(state.error) : undefined)
  }, [state.done, state.error, state.outcome, onFinish, exit])

  return (
    <Box flexDirection="column" padding={1}>
      <Header />
      <ConfigInfo args={args} />
      <StatusInfo state={state} outdir={args.outdir} />
      <ModelList models={args.models} state={state} />
    </Box>
  )
}
