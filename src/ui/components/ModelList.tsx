import React from "react"
import { Box, Text } from "ink"
import Spinner from "ink-spinner"
import type { RunState } from "../../hooks/useModelRun"
import { modelLabel } from "../../config/models"

interface ModelListProps {
  models: string[]
  state: RunState
}

export function ModelList({ models, state }: ModelListProps) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="blue" paddingX={1}>
      <Box>
        <Box width="40%">
          <Text bold underline>Model</Text>
        </Box>
        <Box width="20%">
          <Text bold underline>Progress</Text>
        </Box>
        <Box width="20%">
          <Text bold underline>New/Stored</Text>
        </Box>
        <Box width="20%">
          <Text bold underline>Failed</Text>
        </Box>
      </Box>
      {models.map((m: string) => {
        const p = state.models[m]
        const name = modelLabel(m)

        if (!p) {
          return (
            <Box key={m}>
              <Box width="40%">
                <Text color="gray">{name}</Text>
              </Box>
              <Box width="60%">
                <Text dimColor>Pending...</Text>
              </Box>
            </Box>
          )
        }

        return (
          <Box key={m}>
            <Box width="40%">
              <Text color={p.finished ? (p.failed > 0 ? "red" : "green") : "yellow"}>{name}</Text>
            </Box>
            <Box width="20%">
              <Text>
                {p.finished ? null : (
                  <>
                    <Spinner type="dots" />{" "}
                  </>
                )}
                {p.done}/{p.total}
              </Text>
            </Box>
            <Box width="20%">
              <Text>
                {p.completed}/{p.skipped}
              </Text>
            </Box>
            <Box width="20%">
              <Text color={p.failed > 0 ? "red" : undefined}>{p.failed}</Text>
            </Box>
          </Box>
        )
      })}
    </Box>
  )
}
