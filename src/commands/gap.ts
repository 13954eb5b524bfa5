import type { GapArgs } from "../lib/args"
import { computeGap, loadReport, type GapReport } from "../lib/gap"
import { renderGapSummary, writeJson } from "../lib/report"

export async function gapCommand(args: GapArgs, now?: Date): Promise<GapReport> {
  const [original, isomorphic] = await Promise.all([loadReport(args.original), loadReport(args.isomorphic)])
  const gap = computeGap(original, isomorphic, { original: args.original, isomorphic: args.isomorphic }, now)
  await writeJson(args.out, gap)

  console.log(renderGapSummary(gap))
  for (const [model, g] of Object.entries(gap.models)) {
    if (g.unmatched_keys.length === 0) continue
    console.warn(`${model}: ${g.unmatched_keys.length} bucket key(s) in only one report: ${g.unmatched_keys.join(", ")}`)
  }
  console.log(`Gap report written to ${args.out}`)
  return gap
}
