import { z } from "zod";

const count = z
  .number({ invalid_type_error: "must be a non-negative integer" })
  .int({ message: "must be a non-negative integer" })
  .nonnegative({ message: "must be a non-negative integer" });

const breakdown = z.record(z.string().min(1), count);

const criteriaList = z.array(z.string().min(1)).default([]);

export const reviewerAgreementSchema = z.object({
  include_include: count,
  include_exclude: count,
  exclude_include: count,
  exclude_exclude: count,
});

/** Shape of a review configuration file. Keys mirror the JSON on disk. */
export const reviewConfigSchema = z.object({
  name: z.string().min(1, { message: "must not be empty" }),
  review_focus: z.string().default(""),
  initial_records: count,
  title_abstract_excluded: count,
  full_text_excluded: count,
  final_included: count,
  title_abstract_exclusion_breakdown: breakdown,
  full_text_exclusion_breakdown: breakdown,
  inclusion_criteria: criteriaList,
  exclusion_criteria: criteriaList,
  search_databases: criteriaList,
  reviewer_agreement_counts: reviewerAgreementSchema,
  kappa_threshold: z
    .number()
    .min(0, { message: "must be between 0 and 1" })
    .max(1, { message: "must be between 0 and 1" })
    .default(0.6),
});

export type ReviewConfigInput = z.input<typeof reviewConfigSchema>;
export type ReviewConfigFile = z.output<typeof reviewConfigSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
