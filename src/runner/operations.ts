import { loadBundledConfig, loadConfigFile } from "../config/store.js";
import { compareFlows } from "../pipeline/compare.js";
import { runPipeline } from "../pipeline/index.js";
import type { PipelineResult } from "../pipeline/index.js";
import type { Logger } from "../logger.js";
import { renderSummaryReport } from "../report/summaryReport.js";
import { renderComparisonCsv } from "../report/tables.js";
import { writeArtifacts } from "../report/writer.js";
import type { ComparisonResult, ReportArtifact, ReviewConfig } from "../types.js";

export type RunnerOperation =
  | { kind: "run-default" }
  | { kind: "run-custom"; configPath?: string }
  | { kind: "compare"; leftPath?: string; rightPath?: string }
  | { kind: "generate-all" };

export type OperationKind = RunnerOperation["kind"];

export interface RunnerContext {
  outDir: string;
  logger: Logger;
}

export interface RunOutcome {
  kind: OperationKind;
  written: string[];
  results: PipelineResult[];
  comparison?: ComparisonResult;
}

export const COMPARISON_FILE = "prisma_comparison.csv";
export const SUMMARY_REPORT_FILE = "prisma_summary_report.txt";

function resolveConfig(filePath: string | undefined, fallback: "default" | "custom"): ReviewConfig {
  return filePath ? loadConfigFile(filePath) : loadBundledConfig(fallback);
}

function logComparison(logger: Logger, comparison: ComparisonResult): void {
  logger.info(`Comparing "${comparison.leftName}" with "${comparison.rightName}"`);
  for (const row of comparison.rows) {
    const left = row.left ?? "undefined";
    const right = row.right ?? "undefined";
    const diff = row.difference ?? "n/a";
    logger.info(`  ${row.metric}: ${left} vs ${right} (difference ${diff})`);
  }
}

function finish(
  ctx: RunnerContext,
  kind: OperationKind,
  results: PipelineResult[],
  extra: ReportArtifact[] = [],
  comparison?: ComparisonResult
): RunOutcome {
  const artifacts = [...results.flatMap((r) => r.artifacts), ...extra];
  const written = writeArtifacts(ctx.outDir, artifacts);
  for (const result of results) {
    const { totals, agreement } = result.flow;
    ctx.logger.info(
      `${result.flow.config.name}: ${totals.finalIncluded} included, ${totals.totalExcluded} excluded, kappa ${agreement.kappa ?? "undefined"}`
    );
    if (agreement.kappa === null) {
      ctx.logger.warn(`${result.flow.config.name}: Cohen's kappa is undefined (chance agreement is 1)`);
    }
  }
  written.forEach((file) => ctx.logger.info(`wrote ${file}`));
  return { kind, written, results, comparison };
}

type Handlers = {
  [K in OperationKind]: (
    op: Extract<RunnerOperation, { kind: K }>,
    ctx: RunnerContext
  ) => RunOutcome;
};

/**
 * Every handler loads and computes all of its inputs before the first write,
 * so a ConfigError leaves the output directory untouched.
 */
const HANDLERS: Handlers = {
  "run-default": (_op, ctx) => {
    const result = runPipeline(loadBundledConfig("default"));
    return finish(ctx, "run-default", [result]);
  },

  "run-custom": (op, ctx) => {
    const result = runPipeline(resolveConfig(op.configPath, "custom"));
    return finish(ctx, "run-custom", [result]);
  },

  compare: (op, ctx) => {
    const left = runPipeline(resolveConfig(op.leftPath, "default"));
    const right = runPipeline(resolveConfig(op.rightPath, "custom"));
    const comparison = compareFlows(left.flow, right.flow);
    logComparison(ctx.logger, comparison);
    const written = writeArtifacts(ctx.outDir, [
      { fileName: COMPARISON_FILE, content: renderComparisonCsv(comparison) },
    ]);
    written.forEach((file) => ctx.logger.info(`wrote ${file}`));
    return { kind: "compare", written, results: [left, right], comparison };
  },

  "generate-all": (_op, ctx) => {
    const results = [
      runPipeline(loadBundledConfig("default")),
      runPipeline(loadBundledConfig("custom")),
    ];
    const comparison = compareFlows(results[0].flow, results[1].flow);
    logComparison(ctx.logger, comparison);
    return finish(
      ctx,
      "generate-all",
      results,
      [
        { fileName: COMPARISON_FILE, content: renderComparisonCsv(comparison) },
        {
          fileName: SUMMARY_REPORT_FILE,
          content: renderSummaryReport(results.map((r) => r.flow)),
        },
      ],
      comparison
    );
  },
};

export function runOperation(op: RunnerOperation, ctx: RunnerContext): RunOutcome {
  switch (op.kind) {
    case "run-default":
      return HANDLERS["run-default"](op, ctx);
    case "run-custom":
      return HANDLERS["run-custom"](op, ctx);
    case "compare":
      return HANDLERS.compare(op, ctx);
    case "generate-all":
      return HANDLERS["generate-all"](op, ctx);
  }
}
