import fs from "node:fs";
import path from "node:path";
import type { ReportArtifact } from "../types.js";

/**
 * Writes rendered artifacts under outDir and returns their paths. Errors from
 * the filesystem propagate; files already written are left in place.
 */
export function writeArtifacts(outDir: string, artifacts: readonly ReportArtifact[]): string[] {
  fs.mkdirSync(outDir, { recursive: true });
  return artifacts.map((artifact) => {
    const filePath = path.join(outDir, artifact.fileName);
    fs.writeFileSync(filePath, artifact.content, "utf-8");
    return filePath;
  });
}
