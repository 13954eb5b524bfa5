/**
 * Default model IDs used when the CLI flag `--models` is not provided.
 * `ollama:<tag>` entries run against a local Ollama server, everything else
 * goes through OpenRouter.
 *
 * Each entry also contains a short alias used in the terminal progress view.
 */
const MODEL_CONFIG = [
  {
    id: "ollama:qwen2.5:7b",
    alias: "QWEN7B",
    display: "Qwen 2.5 7B (local)",
  },
  {
    id: "ollama:llama3.1:8b",
    alias: "LL8B",
    display: "Llama 3.1 8B (local)",
  },
  {
    id: "ollama:mistral:7b",
    alias: "MISTRAL7B",
    display: "Mistral 7B (local)",
  },
  {
    id: "meta-llama/llama-3.3-70b-instruct:free",
    alias: "LL70B",
    display: "Llama 3.3 70B Instruct (Free)",
  },
] as const

export const DEFAULT_MODELS = MODEL_CONFIG.map((entry) => entry.id)

export const MODEL_ALIASES = MODEL_CONFIG.reduce<Record<string, string>>((acc, entry) => {
  acc[entry.id] = entry.alias
  return acc
}, {})

/**
 * Short label for a model id: its alias when it has one, otherwise the id
 * truncated to `width` characters.
 */
export function modelLabel(modelId: string, width = 30): string {
  const alias = MODEL_ALIASES[modelId]
  if (alias) return alias
  return modelId.length > width ? modelId.slice(0, width - 3) + "..." : modelId
}
