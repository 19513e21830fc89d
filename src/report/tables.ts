import type { ComparisonResult, ExclusionPhase, FlowResult } from "../types.js";
import { toCsv } from "./csv.js";

export const SUMMARY_HEADERS = [
  "PRISMA_Phase",
  "Records_Count",
  "Excluded_Count",
  "Cumulative_Exclusion",
] as const;

export const EXCLUSION_HEADERS = [
  "Phase",
  "Exclusion_Reason",
  "Count",
  "Percentage_of_Initial",
] as const;

export const PHASE_LABELS: Record<ExclusionPhase, string> = {
  title_abstract: "Title/Abstract",
  full_text: "Full-text",
};

/** One row per PRISMA phase; Records_Count is what the phase kept. */
export function renderSummaryCsv(flow: FlowResult): string {
  return toCsv(
    SUMMARY_HEADERS,
    flow.phases.map((p) => [p.phase, p.recordsOut, p.excluded, p.cumulativeExcluded])
  );
}

export function renderExclusionsCsv(flow: FlowResult): string {
  const reasons = [...flow.exclusions.titleAbstract, ...flow.exclusions.fullText];
  return toCsv(
    EXCLUSION_HEADERS,
    reasons.map((r) => [PHASE_LABELS[r.phase], r.reason, r.count, r.percentageOfInitial])
  );
}

export function renderComparisonCsv(comparison: ComparisonResult): string {
  return toCsv(
    ["Metric", comparison.leftName, comparison.rightName, "Difference"],
    comparison.rows.map((row) => [row.metric, row.left, row.right, row.difference])
  );
}
