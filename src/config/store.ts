import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, errorMessage } from "../errors.js";
import type { ExclusionCount, ReviewConfig } from "../types.js";
import { formatIssues, reviewConfigSchema } from "./schema.js";
import type { ReviewConfigFile } from "./schema.js";
import { assertConsistent } from "./validation.js";

export type BundledConfigName = "default" | "custom";

/** `config/` at the package root, from both src/config and dist/config. */
export const BUNDLED_CONFIG_DIR = fileURLToPath(new URL("../../config/", import.meta.url));

/**
 * Validates raw configuration data and returns an immutable ReviewConfig.
 * Shape errors and count mismatches are both reported as a ConfigError.
 */
export function parseConfig(raw: unknown): ReviewConfig {
  const parsed = reviewConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("Invalid configuration", formatIssues(parsed.error));
  }

  const config = toReviewConfig(parsed.data);
  assertConsistent(config);
  return config;
}

export function loadConfigFile(filePath: string): ReviewConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read configuration ${filePath}`, [errorMessage(error)]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration ${filePath} is not valid JSON`, [errorMessage(error)]);
  }
  return parseConfig(raw);
}

export function loadBundledConfig(name: BundledConfigName): ReviewConfig {
  return loadConfigFile(path.join(BUNDLED_CONFIG_DIR, `${name}.json`));
}

function toReviewConfig(data: ReviewConfigFile): ReviewConfig {
  const agreement = data.reviewer_agreement_counts;
  return Object.freeze({
    name: data.name,
    reviewFocus: data.review_focus,
    initialRecords: data.initial_records,
    titleAbstractExcluded: data.title_abstract_excluded,
    fullTextExcluded: data.full_text_excluded,
    finalIncluded: data.final_included,
    titleAbstractBreakdown: toBreakdown(data.title_abstract_exclusion_breakdown),
    fullTextBreakdown: toBreakdown(data.full_text_exclusion_breakdown),
    inclusionCriteria: Object.freeze([...data.inclusion_criteria]),
    exclusionCriteria: Object.freeze([...data.exclusion_criteria]),
    searchDatabases: Object.freeze([...data.search_databases]),
    reviewerAgreement: Object.freeze({
      includeInclude: agreement.include_include,
      includeExclude: agreement.include_exclude,
      excludeInclude: agreement.exclude_include,
      excludeExclude: agreement.exclude_exclude,
    }),
    kappaThreshold: data.kappa_threshold,
  });
}

// Entries keep the key order of the configuration file.
function toBreakdown(record: Record<string, number>): readonly ExclusionCount[] {
  return Object.freeze(
    Object.entries(record).map(([reason, count]) => Object.freeze({ reason, count }))
  );
}
