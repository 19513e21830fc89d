import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../../src/errors.js";
import { menuText, parseMenuChoice, runMenu } from "../../src/runner/menu.js";
import {
  COMPARISON_FILE,
  SUMMARY_REPORT_FILE,
  runOperation,
} from "../../src/runner/operations.js";
import { lines, makeRawConfig, makeTempDir, makeTestLogger, writeJson } from "../helpers.js";

describe("L6 · runner operations (integration)", () => {
  it("run-default writes the five default artifacts", () => {
    const outDir = makeTempDir();
    const { logger } = makeTestLogger();

    const outcome = runOperation({ kind: "run-default" }, { outDir, logger });

    expect(outcome.written.map((p) => path.basename(p))).toEqual([
      "prisma_study_selection_summary.csv",
      "prisma_study_selection_exclusions.csv",
      "prisma_study_selection.json",
      "prisma_study_selection_flowchart.txt",
      "prisma_study_selection_kappa.txt",
    ]);
    expect(fs.readdirSync(outDir)).toHaveLength(5);
  });

  it("run-custom falls back to the bundled custom configuration", () => {
    const outDir = makeTempDir();
    const { logger, sink } = makeTestLogger();

    const outcome = runOperation({ kind: "run-custom" }, { outDir, logger });

    expect(outcome.results[0].flow.totals.finalIncluded).toBe(85);
    expect(fs.existsSync(path.join(outDir, "prisma_custom_summary.csv"))).toBe(true);
    expect(sink.lines).toContain("[test] custom: 85 included, 240 excluded, kappa 0.819");
  });

  it("run-custom reads a configuration file", () => {
    const dir = makeTempDir();
    const configPath = writeJson(dir, "mine.json", makeRawConfig({ name: "My Review" }));
    const outDir = path.join(dir, "out");
    const { logger } = makeTestLogger();

    runOperation({ kind: "run-custom", configPath }, { outDir, logger });

    expect(fs.readdirSync(outDir).sort()).toEqual([
      "prisma_my_review.json",
      "prisma_my_review_exclusions.csv",
      "prisma_my_review_flowchart.txt",
      "prisma_my_review_kappa.txt",
      "prisma_my_review_summary.csv",
    ]);
  });

  it("compare writes a comparison table of default against custom", () => {
    const outDir = makeTempDir();
    const { logger, sink } = makeTestLogger();

    const outcome = runOperation({ kind: "compare" }, { outDir, logger });

    expect(fs.readdirSync(outDir)).toEqual([COMPARISON_FILE]);
    expect(fs.readFileSync(path.join(outDir, COMPARISON_FILE), "utf-8")).toBe(
      [
        "Metric,study_selection,custom,Difference",
        "Initial Records,462,325,-137",
        "Title/Abstract Excluded,60,45,-15",
        "Full-text Excluded,314,195,-119",
        "Total Excluded,374,240,-134",
        "Final Included,88,85,-3",
        "Inclusion Rate (%),19.05,26.15,7.1",
        "Cohen's Kappa,0.876,0.819,-0.057",
        "",
      ].join("\n")
    );
    expect(outcome.comparison?.rows).toHaveLength(7);
    expect(sink.lines).toContain("[test]   Final Included: 88 vs 85 (difference -3)");
  });

  it("compare writes nothing when either configuration is inconsistent", () => {
    const dir = makeTempDir();
    const bad = writeJson(dir, "bad.json", makeRawConfig({ final_included: 29 }));
    const good = writeJson(dir, "good.json", makeRawConfig());
    const outDir = path.join(dir, "out");
    const { logger } = makeTestLogger();

    expect(() =>
      runOperation({ kind: "compare", leftPath: good, rightPath: bad }, { outDir, logger })
    ).toThrow(ConfigError);
    expect(fs.existsSync(outDir)).toBe(false);
  });

  it("run-custom produces zero files for a negative final count", () => {
    const dir = makeTempDir();
    const configPath = writeJson(
      dir,
      "negative.json",
      makeRawConfig({
        full_text_excluded: 90,
        final_included: -10,
        full_text_exclusion_breakdown: { no_outcome_data: 90 },
      })
    );
    const outDir = path.join(dir, "out");
    const { logger } = makeTestLogger();

    expect(() => runOperation({ kind: "run-custom", configPath }, { outDir, logger })).toThrow(
      ConfigError
    );
    expect(fs.existsSync(outDir)).toBe(false);
  });

  it("generate-all writes both configurations, the comparison and the summary report", () => {
    const outDir = makeTempDir();
    const { logger } = makeTestLogger();

    const outcome = runOperation({ kind: "generate-all" }, { outDir, logger });

    expect(outcome.written).toHaveLength(12);
    expect(fs.readdirSync(outDir)).toContain(COMPARISON_FILE);
    const summary = fs.readFileSync(path.join(outDir, SUMMARY_REPORT_FILE), "utf-8");
    expect(summary).toContain("CONFIGURATION: study_selection\n");
    expect(summary).toContain("CONFIGURATION: custom\n");
  });
});

describe("L6 · interactive menu", () => {
  it("lists the five numbered options", () => {
    expect(menuText().split("\n")).toEqual([
      "Select an option:",
      "1. Run default configuration",
      "2. Run custom configuration",
      "3. Compare configurations",
      "4. Generate all reports",
      "5. Exit",
    ]);
  });

  it("maps choices onto operations", () => {
    expect(parseMenuChoice("1")).toEqual({ kind: "operation", operation: { kind: "run-default" } });
    expect(parseMenuChoice(" 4 ")).toEqual({
      kind: "operation",
      operation: { kind: "generate-all" },
    });
    expect(parseMenuChoice("5")).toEqual({ kind: "exit" });
    expect(parseMenuChoice("6")).toBeNull();
    expect(parseMenuChoice("")).toBeNull();
  });

  it("runs selections until exit and rejects unknown input", async () => {
    const outDir = makeTempDir();
    const { logger, sink } = makeTestLogger();

    const code = await runMenu(lines("1", "9", "5", "2"), { outDir, logger });

    expect(code).toBe(0);
    expect(sink.lines).toContain('[test] warning: Invalid choice "9". Please enter 1-5.');
    expect(fs.readdirSync(outDir)).toHaveLength(5);
    expect(fs.existsSync(path.join(outDir, "prisma_custom_summary.csv"))).toBe(false);
  });

  it("stops at end of input", async () => {
    const outDir = makeTempDir();
    const { logger } = makeTestLogger();

    const code = await runMenu(["3"], { outDir, logger });

    expect(code).toBe(0);
    expect(fs.readdirSync(outDir)).toEqual([COMPARISON_FILE]);
  });
});
