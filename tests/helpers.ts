import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ReviewConfigInput } from "../src/config/schema.js";
import { parseConfig } from "../src/config/store.js";
import { createLogger, createMemorySink } from "../src/logger.js";
import type { ReviewConfig } from "../src/types.js";

/**
 * 100 records → 20 excluded at screening → 50 excluded at full text → 30 included.
 * Reviewer tallies: 20/5/5/70, so p_o = 0.9, p_e = 0.625, κ ≈ 0.733.
 */
export function makeRawConfig(overrides: Partial<ReviewConfigInput> = {}): ReviewConfigInput {
  return {
    name: "unit_review",
    review_focus: "Test review",
    initial_records: 100,
    title_abstract_excluded: 20,
    full_text_excluded: 50,
    final_included: 30,
    title_abstract_exclusion_breakdown: { off_topic: 12, duplicate_records: 8 },
    full_text_exclusion_breakdown: { no_outcome_data: 30, wrong_population: 20 },
    inclusion_criteria: ["Randomised trial", "Adults"],
    exclusion_criteria: ["Animal study"],
    search_databases: ["PubMed", "Scopus"],
    reviewer_agreement_counts: {
      include_include: 20,
      include_exclude: 5,
      exclude_include: 5,
      exclude_exclude: 70,
    },
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<ReviewConfigInput> = {}): ReviewConfig {
  return parseConfig(makeRawConfig(overrides));
}

export function makeTempDir(prefix = "prisma-flow-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeJson(dir: string, name: string, value: unknown): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, JSON.stringify(value, null, 2), "utf-8");
  return filePath;
}

export function makeTestLogger() {
  const sink = createMemorySink();
  return { sink, logger: createLogger("test", sink) };
}

export async function* lines(...values: string[]): AsyncGenerator<string> {
  yield* values;
}
