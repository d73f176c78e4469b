import type { ProofWarning } from "../extract/types.js";
import type { GenerationResult, VerificationOutcome } from "../proof/types.js";
import { renderAsciiBox, renderAsciiTable, truncateHash } from "./report-utils.js";

export interface ProofRenderOptions {
  readonly outputPath?: string;
  readonly verbose?: boolean;
}

export function renderGenerationReport(
  result: GenerationResult,
  options: ProofRenderOptions = {},
): string {
  const { proof } = result;
  const lines: string[] = [
    renderAsciiBox([
      "Proof-of-Detection",
      `Merkle Root: ${proof.merkle_root}`,
      `Total Rules: ${proof.total_rules}`,
      `Tree Depth: ${proof.tree_depth}`,
    ]),
  ];

  lines.push("");
  if (proof.source_files.length === 0) {
    lines.push("Sources: none");
  } else {
    lines.push("Sources:");
    for (const source of proof.source_files) {
      lines.push(`- ${source}`);
    }
  }

  if (result.warnings.length > 0) {
    lines.push("");
    lines.push(renderWarnings(result.warnings));
  }

  if (options.verbose && proof.rule_hashes.length > 0) {
    lines.push("");
    lines.push(
      renderAsciiTable(
        proof.rule_hashes.map((leaf) => [
          leaf.rule_id,
          truncateHash(leaf.hash),
          leaf.source_file,
          String(leaf.line_number),
        ]),
        ["Rule", "Hash", "Source", "Line"],
      ),
    );
  }

  if (options.outputPath) {
    lines.push("");
    lines.push(`Saved to: ${options.outputPath}`);
  }

  return lines.join("\n");
}

export function renderWarnings(warnings: readonly ProofWarning[]): string {
  return [
    "Warnings:",
    ...warnings.map((warning) => `- [${warning.kind}] ${warning.message}`),
  ].join("\n");
}

export function renderVerificationReport(
  proofPath: string,
  outcome: VerificationOutcome,
): string {
  const lines = [
    `Proof: ${proofPath}`,
    `Rules: ${outcome.leafCount}`,
    `Tree Depth: ${outcome.depth}`,
    `Stored:  ${outcome.storedRoot}`,
    `Rebuilt: ${outcome.rebuiltRoot}`,
  ];
  if (outcome.issues.length > 0) {
    lines.push("");
    lines.push("Issues:");
    for (const issue of outcome.issues) {
      lines.push(`- ${issue}`);
    }
  }
  return lines.join("\n");
}

export function renderVerificationFailure(
  proofPath: string,
  error: Error,
): string {
  return [`Proof: ${proofPath}`, `[ERROR] ${error.message}`].join("\n");
}
