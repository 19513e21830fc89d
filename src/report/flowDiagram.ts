import type { ExclusionReason, FlowResult, PhaseRecord, PrismaStage } from "../types.js";

const INDENT = "   ";

interface DiagramSection {
  stage: PrismaStage;
  box: string[];
  notes: string[];
}

function reasonTree(reasons: readonly ExclusionReason[]): string[] {
  return reasons.map((r, i) => {
    const branch = i === reasons.length - 1 ? "└─" : "├─";
    return `${INDENT}${branch} ${r.reason} (n = ${r.count})`;
  });
}

function phaseBox(phase: PhaseRecord): string[] {
  return [phase.phase, `Records in: n = ${phase.recordsIn}`, `Excluded: n = ${phase.excluded}`];
}

function sections(flow: FlowResult): DiagramSection[] {
  const { agreement, config } = flow;
  const kappaLine =
    agreement.kappa === null
      ? `${INDENT}Inter-rater agreement: κ undefined (chance agreement is 1)`
      : `${INDENT}Inter-rater agreement: κ = ${agreement.kappa} (${agreement.interpretation})`;

  return flow.phases.map((phase) => {
    const notes: string[] = [];
    switch (phase.stage) {
      case "identification":
        if (config.searchDatabases.length > 0) {
          notes.push(`${INDENT}Databases: ${config.searchDatabases.join(", ")}`);
        }
        break;
      case "screening":
        notes.push(...reasonTree(flow.exclusions.titleAbstract), kappaLine);
        break;
      case "eligibility":
        notes.push(...reasonTree(flow.exclusions.fullText));
        break;
      case "included":
        notes.push(`${INDENT}Studies included in synthesis (n = ${phase.recordsOut})`);
        break;
    }
    return { stage: phase.stage, box: phaseBox(phase), notes };
  });
}

/**
 * Fixed-width PRISMA 2020 diagram: one box per phase, top to bottom, joined by
 * arrows. All boxes share the width of the longest box line.
 */
export function renderFlowDiagram(flow: FlowResult): string {
  const all = sections(flow);
  const width = Math.max(...all.flatMap((s) => s.box.map((line) => line.length)));
  const border = `+${"-".repeat(width + 2)}+`;
  const pad = " ".repeat(Math.floor((width + 4) / 2));

  const title = `PRISMA 2020 FLOW DIAGRAM - ${flow.config.name.toUpperCase()}`;
  const lines = [title, "=".repeat(title.length)];
  if (flow.config.reviewFocus) {
    lines.push(`Review focus: ${flow.config.reviewFocus}`);
  }

  all.forEach((section, i) => {
    if (i > 0) lines.push(`${pad}|`, `${pad}v`);
    lines.push(
      "",
      section.stage.toUpperCase(),
      border,
      ...section.box.map((line) => `| ${line.padEnd(width)} |`),
      border,
      ...section.notes
    );
  });

  return `${lines.join("\n")}\n`;
}
