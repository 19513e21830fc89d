import type { AgreementMetric, ConfidenceLevel, ReviewerAgreementCounts } from "../types.js";
import { percentageOf, roundHalfUp } from "./rounding.js";

export const UNDEFINED_KAPPA = "Undefined (chance agreement is 1)";

/** Landis & Koch (1977) bands, checked in ascending order. */
const KAPPA_BANDS: ReadonlyArray<{ below: number; label: string }> = [
  { below: 0, label: "Poor agreement" },
  { below: 0.2, label: "Slight agreement" },
  { below: 0.4, label: "Fair agreement" },
  { below: 0.6, label: "Moderate agreement" },
  { below: 0.8, label: "Substantial agreement" },
];

export function interpretKappa(kappa: number | null): string {
  if (kappa === null) return UNDEFINED_KAPPA;
  return KAPPA_BANDS.find((b) => kappa < b.below)?.label ?? "Almost perfect agreement";
}

export function confidenceLevel(kappa: number | null): ConfidenceLevel {
  if (kappa === null) return "Undefined";
  if (kappa >= 0.75) return "High";
  if (kappa >= 0.6) return "Moderate";
  return "Low";
}

export interface KappaComponents {
  total: number;
  /** p_o */
  observed: number;
  /** p_e */
  expected: number;
  reviewer1IncludeRate: number;
  reviewer1ExcludeRate: number;
  reviewer2IncludeRate: number;
  reviewer2ExcludeRate: number;
  /** (p_o − p_e) / (1 − p_e), unrounded; null when p_e = 1 */
  kappa: number | null;
}

/**
 * Cohen's kappa for two reviewers making include/exclude decisions:
 *   κ = (p_o − p_e) / (1 − p_e)
 * Callers must pass at least one decision.
 */
export function kappaComponents(counts: ReviewerAgreementCounts): KappaComponents {
  const a = counts.includeInclude;
  const b = counts.includeExclude;
  const c = counts.excludeInclude;
  const d = counts.excludeExclude;
  const n = a + b + c + d;

  const reviewer1IncludeRate = (a + b) / n;
  const reviewer1ExcludeRate = (c + d) / n;
  const reviewer2IncludeRate = (a + c) / n;
  const reviewer2ExcludeRate = (b + d) / n;

  // Integer numerators keep p_e exactly 1 when both reviewers are unanimous.
  const observed = (a + d) / n;
  const expectedNumerator = (a + b) * (a + c) + (c + d) * (b + d);
  const expected = expectedNumerator / (n * n);
  const kappa = expectedNumerator === n * n ? null : (observed - expected) / (1 - expected);

  return {
    total: n,
    observed,
    expected,
    reviewer1IncludeRate,
    reviewer1ExcludeRate,
    reviewer2IncludeRate,
    reviewer2ExcludeRate,
    kappa,
  };
}

export function calculateAgreement(
  counts: ReviewerAgreementCounts,
  threshold: number
): AgreementMetric {
  const parts = kappaComponents(counts);
  const kappa = parts.kappa === null ? null : roundHalfUp(parts.kappa, 3);
  const disagreements = counts.includeExclude + counts.excludeInclude;

  return {
    kappa,
    observedAgreement: roundHalfUp(parts.observed, 3),
    expectedAgreement: roundHalfUp(parts.expected, 3),
    percentAgreement: percentageOf(counts.includeInclude + counts.excludeExclude, parts.total, 1),
    disagreementRate: percentageOf(disagreements, parts.total, 1),
    totalAssessed: parts.total,
    interpretation: interpretKappa(parts.kappa),
    confusionMatrix: { ...counts },
    quality: {
      threshold,
      meetsThreshold: kappa !== null && kappa >= threshold,
      confidenceLevel: confidenceLevel(kappa),
    },
  };
}
