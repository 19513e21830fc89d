import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadBundledConfig } from "../../src/config/store.js";
import { ConfigError } from "../../src/errors.js";
import { artifactBaseName, runPipeline } from "../../src/pipeline/index.js";
import { writeArtifacts } from "../../src/report/writer.js";
import { makeConfig, makeTempDir } from "../helpers.js";

function artifact(result: ReturnType<typeof runPipeline>, suffix: string): string {
  const found = result.artifacts.find((a) => a.fileName.endsWith(suffix));
  if (!found) throw new Error(`no artifact ending in ${suffix}`);
  return found.content;
}

describe("L5 · report pipeline (integration)", () => {
  it("renders every artifact for the default methodology", () => {
    const result = runPipeline(loadBundledConfig("default"));

    expect(result.artifacts.map((a) => a.fileName)).toEqual([
      "prisma_study_selection_summary.csv",
      "prisma_study_selection_exclusions.csv",
      "prisma_study_selection.json",
      "prisma_study_selection_flowchart.txt",
      "prisma_study_selection_kappa.txt",
    ]);
  });

  it("produces the default summary CSV", () => {
    const result = runPipeline(loadBundledConfig("default"));

    expect(artifact(result, "_summary.csv")).toBe(
      [
        "PRISMA_Phase,Records_Count,Excluded_Count,Cumulative_Exclusion",
        "Initial Database Search,462,0,0",
        "Title/Abstract Screening,402,60,60",
        "Full-text Assessment,88,314,374",
        "Final Inclusion,88,0,374",
        "",
      ].join("\n")
    );
  });

  it("produces the default exclusion breakdown CSV", () => {
    const result = runPipeline(loadBundledConfig("default"));

    expect(artifact(result, "_exclusions.csv")).toBe(
      [
        "Phase,Exclusion_Reason,Count,Percentage_of_Initial",
        "Title/Abstract,Duplicate Methodologies,10,2.16",
        "Title/Abstract,Insufficient Deep Learning,10,2.16",
        "Title/Abstract,Preliminary Results,8,1.73",
        "Title/Abstract,No Spatial Resolution,7,1.52",
        "Title/Abstract,Non Cardiac Focus,6,1.3",
        "Title/Abstract,Insufficient Methodology,6,1.3",
        "Title/Abstract,Small Sample Sizes,4,0.87",
        "Title/Abstract,Theoretical Only,4,0.87",
        "Title/Abstract,Other Reasons,5,1.08",
        "Full-text,Not Cardiomyocyte Focused,95,20.56",
        "Full-text,Methodological Overlap Redundancy,85,18.4",
        "Full-text,Insufficient Reproducibility,60,12.99",
        "Full-text,Bulk Transcriptomics Only,45,9.74",
        "Full-text,No Spatial Integration,29,6.28",
        "",
      ].join("\n")
    );
  });

  it("records the default flow and agreement in the JSON artifact", () => {
    const record = JSON.parse(artifact(runPipeline(loadBundledConfig("default")), ".json"));

    expect(record.phases.map((p: { records_out: number }) => p.records_out)).toEqual([
      462, 402, 88, 88,
    ]);
    expect(record.exclusion_reasons.full_text[0].percentage_of_initial).toBe(20.56);
    expect(record.inter_rater_agreement).toMatchObject({
      cohens_kappa: 0.876,
      interpretation: "Almost perfect agreement",
      observed_agreement: 0.963,
      expected_agreement: 0.704,
      percent_agreement: 96.3,
      disagreement_rate: 3.7,
      total_assessed: 462,
    });
    expect(record.summary).toEqual({
      total_excluded: 374,
      final_included: 88,
      inclusion_rate: 19.05,
    });
  });

  it("spells out the default kappa calculation", () => {
    const lines = artifact(runPipeline(loadBundledConfig("default")), "_kappa.txt").split("\n");

    expect(lines).toContain("   Po = (75 + 370) / 462 = 0.963");
    expect(lines).toContain("   κ = (0.963 - 0.704) / (1 - 0.704) = 0.876");
    expect(lines).toContain("Interpretation: Almost perfect agreement");
  });

  it("draws the default flowchart", () => {
    const text = artifact(runPipeline(loadBundledConfig("default")), "_flowchart.txt");

    expect(text).toContain("| Excluded: n = 314 ");
    expect(text).toContain("   └─ No Spatial Integration (n = 29)\n");
    expect(text).toContain("   Inter-rater agreement: κ = 0.876 (Almost perfect agreement)\n");
    expect(text.endsWith("   Studies included in synthesis (n = 88)\n")).toBe(true);
  });

  it("writes byte-identical artifacts on repeated runs", () => {
    const first = makeTempDir();
    const second = makeTempDir();

    const a = writeArtifacts(first, runPipeline(loadBundledConfig("default")).artifacts);
    const b = writeArtifacts(second, runPipeline(loadBundledConfig("default")).artifacts);

    expect(a.map((p) => path.basename(p))).toEqual(b.map((p) => path.basename(p)));
    a.forEach((file, i) => {
      expect(fs.readFileSync(file)).toEqual(fs.readFileSync(b[i]));
    });
  });

  it("creates the output directory and writes UTF-8 text", () => {
    const outDir = path.join(makeTempDir(), "nested", "reports");
    const written = writeArtifacts(outDir, runPipeline(makeConfig()).artifacts);

    expect(written).toHaveLength(5);
    expect(fs.readFileSync(path.join(outDir, "prisma_unit_review_flowchart.txt"), "utf-8")).toContain(
      "κ = 0.733"
    );
  });

  it("fails before rendering when the counts do not reconcile", () => {
    const config = { ...makeConfig(), fullTextExcluded: 81 };
    expect(() => runPipeline(config)).toThrow(ConfigError);
  });

  it("derives artifact base names from the configuration name", () => {
    expect(artifactBaseName("study_selection")).toBe("prisma_study_selection");
    expect(artifactBaseName("Cancer Review 2024")).toBe("prisma_cancer_review_2024");
    expect(artifactBaseName("***")).toBe("prisma_review");
  });
});
