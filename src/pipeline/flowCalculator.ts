import { assertConsistent } from "../config/validation.js";
import type {
  ExclusionCount,
  ExclusionPhase,
  ExclusionReason,
  FlowResult,
  PhaseRecord,
  PrismaStage,
  ReviewConfig,
} from "../types.js";
import { calculateAgreement } from "./agreement.js";
import { percentageOf } from "./rounding.js";

export const PHASE_NAMES: Record<PrismaStage, string> = {
  identification: "Initial Database Search",
  screening: "Title/Abstract Screening",
  eligibility: "Full-text Assessment",
  included: "Final Inclusion",
};

/**
 * Builds the PRISMA 2020 chain. Each phase starts with what the previous one
 * kept, so recordsOut(N) = recordsIn(N + 1) by construction.
 */
export function buildPhaseRecords(config: ReviewConfig): PhaseRecord[] {
  const steps: Array<[PrismaStage, number]> = [
    ["identification", 0],
    ["screening", config.titleAbstractExcluded],
    ["eligibility", config.fullTextExcluded],
    ["included", 0],
  ];

  const phases: PhaseRecord[] = [];
  let recordsIn = config.initialRecords;
  let cumulativeExcluded = 0;

  for (const [stage, excluded] of steps) {
    const recordsOut = recordsIn - excluded;
    cumulativeExcluded += excluded;
    phases.push({
      stage,
      phase: PHASE_NAMES[stage],
      recordsIn,
      excluded,
      recordsOut,
      cumulativeExcluded,
    });
    recordsIn = recordsOut;
  }

  return phases;
}

/** "duplicate_methodologies" → "Duplicate Methodologies", "non-cardiac" → "Non-Cardiac" */
export function formatReasonLabel(key: string): string {
  return key
    .replace(/_/g, " ")
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match: string, before: string, letter: string) =>
      `${before}${letter.toUpperCase()}`
    );
}

export function buildExclusionReasons(
  phase: ExclusionPhase,
  breakdown: readonly ExclusionCount[],
  initialRecords: number
): ExclusionReason[] {
  return breakdown.map((entry) => ({
    phase,
    reason: formatReasonLabel(entry.reason),
    count: entry.count,
    percentageOfInitial: percentageOf(entry.count, initialRecords),
  }));
}

/**
 * Derives every figure the reports need from a configuration. Throws
 * ConfigError before computing anything if the counts do not reconcile.
 */
export function calculateFlow(config: ReviewConfig): FlowResult {
  assertConsistent(config);

  const phases = buildPhaseRecords(config);
  const last = phases[phases.length - 1];

  return {
    config,
    phases,
    exclusions: {
      titleAbstract: buildExclusionReasons(
        "title_abstract",
        config.titleAbstractBreakdown,
        config.initialRecords
      ),
      fullText: buildExclusionReasons("full_text", config.fullTextBreakdown, config.initialRecords),
    },
    criteria: {
      inclusion: [...config.inclusionCriteria],
      exclusion: [...config.exclusionCriteria],
    },
    agreement: calculateAgreement(config.reviewerAgreement, config.kappaThreshold),
    totals: {
      totalExcluded: last.cumulativeExcluded,
      finalIncluded: last.recordsOut,
      inclusionRate: percentageOf(last.recordsOut, config.initialRecords),
    },
  };
}
