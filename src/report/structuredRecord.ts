import type { AgreementMetric, ExclusionReason, FlowResult } from "../types.js";

function exclusionEntry(r: ExclusionReason) {
  return {
    phase: r.phase,
    reason: r.reason,
    count: r.count,
    percentage_of_initial: r.percentageOfInitial,
  };
}

function agreementEntry(a: AgreementMetric) {
  return {
    cohens_kappa: a.kappa,
    interpretation: a.interpretation,
    observed_agreement: a.observedAgreement,
    expected_agreement: a.expectedAgreement,
    percent_agreement: a.percentAgreement,
    disagreement_rate: a.disagreementRate,
    total_assessed: a.totalAssessed,
    confusion_matrix: {
      include_include: a.confusionMatrix.includeInclude,
      include_exclude: a.confusionMatrix.includeExclude,
      exclude_include: a.confusionMatrix.excludeInclude,
      exclude_exclude: a.confusionMatrix.excludeExclude,
    },
    quality_assessment: {
      acceptable_threshold: a.quality.threshold,
      meets_threshold: a.quality.meetsThreshold,
      confidence_level: a.quality.confidenceLevel,
    },
  };
}

/** Nested, JSON-ready view of a flow. Keys are snake_case like the config file. */
export function buildStructuredRecord(flow: FlowResult) {
  const { config } = flow;
  return {
    review: {
      name: config.name,
      focus: config.reviewFocus,
    },
    identification: {
      initial_records: config.initialRecords,
      databases_searched: [...config.searchDatabases],
    },
    phases: flow.phases.map((p) => ({
      phase: p.phase,
      stage: p.stage,
      records_in: p.recordsIn,
      excluded: p.excluded,
      records_out: p.recordsOut,
      cumulative_excluded: p.cumulativeExcluded,
    })),
    exclusion_reasons: {
      title_abstract: flow.exclusions.titleAbstract.map(exclusionEntry),
      full_text: flow.exclusions.fullText.map(exclusionEntry),
    },
    criteria: {
      inclusion: [...flow.criteria.inclusion],
      exclusion: [...flow.criteria.exclusion],
    },
    inter_rater_agreement: agreementEntry(flow.agreement),
    summary: {
      total_excluded: flow.totals.totalExcluded,
      final_included: flow.totals.finalIncluded,
      inclusion_rate: flow.totals.inclusionRate,
    },
  };
}

export type StructuredRecord = ReturnType<typeof buildStructuredRecord>;

export function renderStructuredJson(flow: FlowResult): string {
  return `${JSON.stringify(buildStructuredRecord(flow), null, 2)}\n`;
}
