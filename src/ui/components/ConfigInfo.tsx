import React from "react"
import { Box, Text } from "ink"
import type { RunArgs } from "../../lib/args"

interface ConfigInfoProps {
  args: RunArgs
}

export function ConfigInfo({ args }: ConfigInfoProps) {
  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1}>
      <Text>
        <Text bold color="cyan">Config: </Text>
        <Text>
          Dataset: {args.dataset} | Limit: {args.limit ?? "all"} | Concurrency: {args.concurrency}
        </Text>
      </Text>
      <Text>
        <Text bold color="cyan">Retry: </Text>
        <Text dimColor>
          timeout {args.timeoutMs}ms, {args.maxRetries} retries, delay {args.retryDelayMs}ms
        </Text>
      </Text>
      <Text>
        <Text bold color="cyan">Decoding: </Text>
        <Text dimColor>
          temperature {args.decoding.temperature}, top-p {args.decoding.topP}, num-ctx {args.decoding.numCtx}, seed{" "}
          {args.decoding.seed}
          {args.overwrite ? " | overwriting stored outputs" : ""}
        </Text>
      </Text>
      <Text>
        <Text bold color="cyan">Models: </Text>
        <Text dimColor>{args.models.join(", ")}</Text>
      </Text>
    </Box>
  )
}
