import { renderFlowDiagram } from "../report/flowDiagram.js";
import { renderKappaDetails } from "../report/kappaDetails.js";
import { renderStructuredJson } from "../report/structuredRecord.js";
import { renderExclusionsCsv, renderSummaryCsv } from "../report/tables.js";
import type { FlowResult, ReportArtifact, ReviewConfig } from "../types.js";
import { calculateFlow } from "./flowCalculator.js";

export interface PipelineResult {
  flow: FlowResult;
  artifacts: ReportArtifact[];
}

/** "Study Selection" → "prisma_study_selection" */
export function artifactBaseName(configName: string): string {
  const slug = configName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `prisma_${slug || "review"}`;
}

export function renderArtifacts(flow: FlowResult): ReportArtifact[] {
  const base = artifactBaseName(flow.config.name);
  return [
    { fileName: `${base}_summary.csv`, content: renderSummaryCsv(flow) },
    { fileName: `${base}_exclusions.csv`, content: renderExclusionsCsv(flow) },
    { fileName: `${base}.json`, content: renderStructuredJson(flow) },
    { fileName: `${base}_flowchart.txt`, content: renderFlowDiagram(flow) },
    { fileName: `${base}_kappa.txt`, content: renderKappaDetails(flow) },
  ];
}

/**
 * Full reporting pipeline, entirely in memory:
 *   1. Reconcile the configured counts (ConfigError on mismatch)
 *   2. Derive phases, exclusion reasons and inter-rater agreement
 *   3. Render every artifact
 * Nothing touches the filesystem, so a failing config never leaves partial output.
 */
export function runPipeline(config: ReviewConfig): PipelineResult {
  const flow = calculateFlow(config);
  return { flow, artifacts: renderArtifacts(flow) };
}
