import React from "react"
import { Box, Text, Newline } from "ink"
import Spinner from "ink-spinner"
import type { RunState } from "../../hooks/useModelRun"

interface StatusInfoProps {
  state: RunState
  outdir: string
}

export function StatusInfo({ state, outdir }: StatusInfoProps) {
  if (state.error) {
    return (
      <Box>
        <Text color="red">ERROR: {state.error}</Text>
      </Box>
    )
  }
  if (!state.started) {
    return (
      <Box>
        <Text color="yellow">
          <Spinner type="dots" /> Loading dataset...
        </Text>
      </Box>
    )
  }

  const running = Object.values(state.models).filter((p) => !p.finished).length
  const lastError = Object.values(state.models)
    .map((p) => p.lastError)
    .filter(Boolean)
    .pop()

  return (
    <Box flexDirection="column">
      <Box marginBottom={1}>
        <Text>
          <Text bold color="green">Status: </Text>
          <Text>{state.done ? "Done." : `Running (${running} model(s) active)`} </Text>
          <Text dimColor>
            ({state.recordsTotal} records, {state.rejected} invalid rows skipped)
          </Text>
        </Text>
      </Box>

      <Box marginBottom={1}>
        <Text>
          <Text bold color="blue">Outputs: </Text>
          <Text>
            {outdir}/&lt;model&gt;/{state.datasetName ?? "-"}.jsonl
          </Text>
          {lastError ? (
            <>
              <Newline />
              <Text dimColor>Last error: {lastError}</Text>
            </>
          ) : null}
        </Text>
      </Box>
    </Box>
  )
}
