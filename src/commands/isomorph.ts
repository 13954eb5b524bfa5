import type { IsomorphArgs } from "../lib/args"
import { loadDataset, writeDataset } from "../lib/dataset"
import { buildVariantDataset, type VariantDataset } from "../lib/isomorph"
import { logRejected } from "./shared"

/**
 * Writes `k` variants per record of a dataset. Records that cannot be varied
 * are reported and left out.
 */
export async function isomorphCommand(args: IsomorphArgs): Promise<VariantDataset> {
  const { records, rejected } = await loadDataset(args.dataset)
  logRejected(args.dataset, rejected)

  const result = buildVariantDataset(records, args.k, args.seed, { style: args.style })
  await writeDataset(args.out, result.variants)

  for (const w of result.warnings) {
    const where = w.variantIndex !== undefined ? `${w.recordId}#${w.variantIndex}` : w.recordId
    console.warn(`warning [${w.code}] ${where}: ${w.message}`)
  }
  for (const s of result.skipped) {
    console.warn(`skipped ${s.recordId}: ${s.reason}`)
  }
  console.log(
    `Wrote ${result.variants.length} variant(s) of ${records.length - result.skipped.length}/${records.length} record(s) to ${args.out} ` +
      `(k=${args.k}, seed=${args.seed}, ${result.skipped.length} skipped, ${result.warnings.length} warning(s))`,
  )
  return result
}
