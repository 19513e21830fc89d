// ── Configuration ─────────────────────────────────────────────────────────────

export interface ExclusionCount {
  /** Configured key, e.g. "duplicate_methodologies" */
  reason: string;
  count: number;
}

export interface ReviewerAgreementCounts {
  /** Both reviewers include */
  includeInclude: number;
  /** Reviewer 1 includes, reviewer 2 excludes */
  includeExclude: number;
  /** Reviewer 1 excludes, reviewer 2 includes */
  excludeInclude: number;
  /** Both reviewers exclude */
  excludeExclude: number;
}

export interface ReviewConfig {
  readonly name: string;
  readonly reviewFocus: string;
  readonly initialRecords: number;
  readonly titleAbstractExcluded: number;
  readonly fullTextExcluded: number;
  readonly finalIncluded: number;
  readonly titleAbstractBreakdown: readonly ExclusionCount[];
  readonly fullTextBreakdown: readonly ExclusionCount[];
  readonly inclusionCriteria: readonly string[];
  readonly exclusionCriteria: readonly string[];
  readonly searchDatabases: readonly string[];
  readonly reviewerAgreement: Readonly<ReviewerAgreementCounts>;
  /** Minimum kappa considered acceptable (0–1) */
  readonly kappaThreshold: number;
}

// ── Flow ──────────────────────────────────────────────────────────────────────

export type PrismaStage = "identification" | "screening" | "eligibility" | "included";

export interface PhaseRecord {
  stage: PrismaStage;
  phase: string;
  recordsIn: number;
  excluded: number;
  recordsOut: number;
  cumulativeExcluded: number;
}

export type ExclusionPhase = "title_abstract" | "full_text";

export interface ExclusionReason {
  phase: ExclusionPhase;
  /** Human-readable label derived from the configured key */
  reason: string;
  count: number;
  /** 100 × count / initial records, 2 decimals */
  percentageOfInitial: number;
}

export interface Criteria {
  inclusion: readonly string[];
  exclusion: readonly string[];
}

// ── Inter-rater agreement ─────────────────────────────────────────────────────

export type ConfidenceLevel = "High" | "Moderate" | "Low" | "Undefined";

export interface AgreementMetric {
  /** Cohen's kappa, null when chance agreement is 1 */
  kappa: number | null;
  observedAgreement: number;
  expectedAgreement: number;
  percentAgreement: number;
  disagreementRate: number;
  totalAssessed: number;
  interpretation: string;
  confusionMatrix: ReviewerAgreementCounts;
  quality: {
    threshold: number;
    meetsThreshold: boolean;
    confidenceLevel: ConfidenceLevel;
  };
}

// ── Result ────────────────────────────────────────────────────────────────────

export interface FlowTotals {
  totalExcluded: number;
  finalIncluded: number;
  /** Final included as % of initial records */
  inclusionRate: number;
}

export interface FlowResult {
  config: ReviewConfig;
  phases: PhaseRecord[];
  exclusions: {
    titleAbstract: ExclusionReason[];
    fullText: ExclusionReason[];
  };
  criteria: Criteria;
  agreement: AgreementMetric;
  totals: FlowTotals;
}

export interface ComparisonRow {
  metric: string;
  left: number | null;
  right: number | null;
  /** right − left, null when either side is undefined */
  difference: number | null;
}

export interface ComparisonResult {
  leftName: string;
  rightName: string;
  rows: ComparisonRow[];
}

// ── Artifacts ─────────────────────────────────────────────────────────────────

export interface ReportArtifact {
  fileName: string;
  content: string;
}
