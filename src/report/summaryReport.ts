import type { FlowResult } from "../types.js";

function heading(text: string): string[] {
  return [text, "-".repeat(text.length)];
}

function bullets(items: readonly string[]): string[] {
  return items.length > 0 ? items.map((item) => `- ${item}`) : ["- (none configured)"];
}

/**
 * Plain-text overview of one or more flows. No timestamp, so the report is
 * byte-identical for identical configurations.
 */
export function renderSummaryReport(flows: readonly FlowResult[]): string {
  const title = "PRISMA STUDY SELECTION SUMMARY REPORT";
  const lines = [title, "=".repeat(title.length)];

  for (const flow of flows) {
    const { config, agreement, totals } = flow;
    lines.push(
      "",
      `CONFIGURATION: ${config.name}`,
      ...(config.reviewFocus ? [`Focus: ${config.reviewFocus}`] : []),
      "",
      ...heading("TARGET NUMBERS"),
      `Initial records: ${config.initialRecords}`,
      `Title/abstract excluded: ${config.titleAbstractExcluded}`,
      `Full-text excluded: ${config.fullTextExcluded}`,
      `Final included: ${config.finalIncluded}`,
      `Total excluded: ${totals.totalExcluded}`,
      `Inclusion rate: ${totals.inclusionRate}%`,
      "",
      ...heading("INCLUSION CRITERIA"),
      ...bullets(flow.criteria.inclusion),
      "",
      ...heading("EXCLUSION CRITERIA"),
      ...bullets(flow.criteria.exclusion),
      "",
      ...heading("SEARCH DATABASES"),
      ...bullets(config.searchDatabases),
      "",
      ...heading("INTER-RATER AGREEMENT"),
      `Cohen's kappa: ${agreement.kappa ?? "undefined"}`,
      `Interpretation: ${agreement.interpretation}`,
      `Percentage agreement: ${agreement.percentAgreement}%`
    );
  }

  return `${lines.join("\n")}\n`;
}
