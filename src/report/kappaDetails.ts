import { kappaComponents } from "../pipeline/agreement.js";
import type { FlowResult } from "../types.js";

const f3 = (n: number) => n.toFixed(3);
const col = (n: number) => String(n).padStart(5);

/** Worked Cohen's kappa calculation for the screening phase. */
export function renderKappaDetails(flow: FlowResult): string {
  const { agreement } = flow;
  const cm = agreement.confusionMatrix;
  const parts = kappaComponents(cm);

  const r1Include = cm.includeInclude + cm.includeExclude;
  const r1Exclude = cm.excludeInclude + cm.excludeExclude;
  const r2Include = cm.includeInclude + cm.excludeInclude;
  const r2Exclude = cm.includeExclude + cm.excludeExclude;

  const lines = [
    "COHEN'S KAPPA CALCULATION DETAILS",
    "=================================",
    "",
    "Confusion matrix (reviewer 1 rows, reviewer 2 columns):",
    "                    Include  Exclude  Total",
    `  Include          ${col(cm.includeInclude)}    ${col(cm.includeExclude)}  ${col(r1Include)}`,
    `  Exclude          ${col(cm.excludeInclude)}    ${col(cm.excludeExclude)}  ${col(r1Exclude)}`,
    `  Total            ${col(r2Include)}    ${col(r2Exclude)}  ${col(parts.total)}`,
    "",
    "1. Observed agreement (Po):",
    `   Po = (${cm.includeInclude} + ${cm.excludeExclude}) / ${parts.total} = ${f3(parts.observed)}`,
    "",
    "2. Expected agreement by chance (Pe):",
    `   R1 include rate = ${r1Include}/${parts.total} = ${f3(parts.reviewer1IncludeRate)}`,
    `   R1 exclude rate = ${r1Exclude}/${parts.total} = ${f3(parts.reviewer1ExcludeRate)}`,
    `   R2 include rate = ${r2Include}/${parts.total} = ${f3(parts.reviewer2IncludeRate)}`,
    `   R2 exclude rate = ${r2Exclude}/${parts.total} = ${f3(parts.reviewer2ExcludeRate)}`,
    `   Pe = (${f3(parts.reviewer1IncludeRate)} × ${f3(parts.reviewer2IncludeRate)}) + (${f3(parts.reviewer1ExcludeRate)} × ${f3(parts.reviewer2ExcludeRate)}) = ${f3(parts.expected)}`,
    "",
    "3. Cohen's kappa (κ):",
    "   κ = (Po - Pe) / (1 - Pe)",
  ];

  if (parts.kappa === null) {
    lines.push("   Pe = 1, so κ is undefined");
  } else {
    lines.push(
      `   κ = (${f3(parts.observed)} - ${f3(parts.expected)}) / (1 - ${f3(parts.expected)}) = ${f3(parts.kappa)}`
    );
  }

  lines.push(
    "",
    `Interpretation: ${agreement.interpretation}`,
    `Confidence: ${agreement.quality.confidenceLevel}`,
    `Meets threshold (≥${agreement.quality.threshold.toFixed(2)}): ${agreement.quality.meetsThreshold ? "Yes" : "No"}`,
    `Percentage agreement: ${agreement.percentAgreement}%`,
    `Disagreement rate: ${agreement.disagreementRate}%`,
    `Total disagreements: ${cm.includeExclude + cm.excludeInclude} of ${parts.total} decisions`
  );

  return `${lines.join("\n")}\n`;
}
