import type { ComparisonResult, ComparisonRow, FlowResult } from "../types.js";
import { roundHalfUp } from "./rounding.js";

type Metric = [label: string, pick: (flow: FlowResult) => number | null];

const METRICS: Metric[] = [
  ["Initial Records", (f) => f.config.initialRecords],
  ["Title/Abstract Excluded", (f) => f.config.titleAbstractExcluded],
  ["Full-text Excluded", (f) => f.config.fullTextExcluded],
  ["Total Excluded", (f) => f.totals.totalExcluded],
  ["Final Included", (f) => f.totals.finalIncluded],
  ["Inclusion Rate (%)", (f) => f.totals.inclusionRate],
  ["Cohen's Kappa", (f) => f.agreement.kappa],
];

/** Side-by-side metrics of two flows; difference is right − left. */
export function compareFlows(left: FlowResult, right: FlowResult): ComparisonResult {
  const rows: ComparisonRow[] = METRICS.map(([metric, pick]) => {
    const l = pick(left);
    const r = pick(right);
    return {
      metric,
      left: l,
      right: r,
      difference: l === null || r === null ? null : roundHalfUp(r - l, 3),
    };
  });

  return { leftName: left.config.name, rightName: right.config.name, rows };
}
