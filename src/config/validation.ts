import { ConfigError } from "../errors.js";
import type { ExclusionCount, ReviewConfig } from "../types.js";

export function sumCounts(breakdown: readonly ExclusionCount[]): number {
  return breakdown.reduce((acc, e) => acc + e.count, 0);
}

/**
 * Lists every way the configured counts fail to reconcile. An empty list means
 * the PRISMA chain initial → screening → eligibility → included is consistent.
 */
export function findInconsistencies(config: ReviewConfig): string[] {
  const issues: string[] = [];

  for (const [key, value] of [
    ["initial_records", config.initialRecords],
    ["title_abstract_excluded", config.titleAbstractExcluded],
    ["full_text_excluded", config.fullTextExcluded],
    ["final_included", config.finalIncluded],
  ] as const) {
    if (!Number.isInteger(value) || value < 0) {
      issues.push(`${key}: must be a non-negative integer`);
    }
  }
  if (issues.length > 0) return issues;

  const afterScreening = config.initialRecords - config.titleAbstractExcluded;
  if (afterScreening < 0) {
    issues.push(
      `title_abstract_excluded (${config.titleAbstractExcluded}) exceeds initial_records (${config.initialRecords})`
    );
  } else {
    const afterEligibility = afterScreening - config.fullTextExcluded;
    if (afterEligibility < 0) {
      issues.push(
        `full_text_excluded (${config.fullTextExcluded}) exceeds records remaining after title/abstract screening (${afterScreening})`
      );
    } else if (afterEligibility !== config.finalIncluded) {
      issues.push(
        `final_included (${config.finalIncluded}) does not match records remaining after full-text assessment (${afterEligibility})`
      );
    }
  }

  const titleAbstractSum = sumCounts(config.titleAbstractBreakdown);
  if (titleAbstractSum !== config.titleAbstractExcluded) {
    issues.push(
      `title_abstract_exclusion_breakdown sums to ${titleAbstractSum} but title_abstract_excluded is ${config.titleAbstractExcluded}`
    );
  }

  const fullTextSum = sumCounts(config.fullTextBreakdown);
  if (fullTextSum !== config.fullTextExcluded) {
    issues.push(
      `full_text_exclusion_breakdown sums to ${fullTextSum} but full_text_excluded is ${config.fullTextExcluded}`
    );
  }

  const a = config.reviewerAgreement;
  if (a.includeInclude + a.includeExclude + a.excludeInclude + a.excludeExclude === 0) {
    issues.push("reviewer_agreement_counts must record at least one decision");
  }

  return issues;
}

export function assertConsistent(config: ReviewConfig): void {
  const issues = findInconsistencies(config);
  if (issues.length > 0) {
    throw new ConfigError(`Configuration "${config.name}" is inconsistent`, issues);
  }
}
