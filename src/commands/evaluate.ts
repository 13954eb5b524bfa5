import type { EvalArgs } from "../lib/args"
import { datasetName, loadDataset } from "../lib/dataset"
import { evaluateRuns, type Report } from "../lib/evaluator"
import { renderReportSummary, writeJson } from "../lib/report"
import { readRunDir } from "../lib/runStore"
import { logRejected } from "./shared"

/**
 * Grades the stored outputs of every model under `rundir` and writes the report.
 * @throws Error if the dataset or run directory cannot be read, or no model has outputs for the dataset.
 */
export async function evalCommand(args: EvalArgs, now?: Date): Promise<Report> {
  const { records, rejected } = await loadDataset(args.dataset, { limit: args.limit })
  logRejected(args.dataset, rejected)

  const name = datasetName(args.dataset)
  const runs = await readRunDir(args.rundir, name)
  if (runs.size === 0) {
    throw new Error(`No run outputs for dataset ${name} under ${args.rundir}`)
  }

  const report = evaluateRuns({
    records,
    runs,
    dataset: args.dataset,
    rundir: args.rundir,
    includeDetails: args.details,
    now,
  })
  await writeJson(args.report, report)

  console.log(renderReportSummary(report))
  for (const [model, m] of Object.entries(report.models)) {
    if (m.ungraded.count === 0) continue
    console.warn(`${model}: ${m.ungraded.count} ungraded record(s)`)
    for (const item of m.ungraded.items) {
      console.warn(`  ${item.record_id}: ${item.reason}${item.detail ? ` (${item.detail})` : ""}`)
    }
  }
  console.log(`Report written to ${args.report}`)
  return report
}
