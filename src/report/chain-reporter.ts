import type { ChainReport } from "../chain/types.js";
import { formatPercent, renderAsciiTable } from "./report-utils.js";

const SAMPLE_ERRORS = 3;

export function renderChainReport(
  report: ChainReport,
  passRate: number,
): string {
  const lines = ["Merkle Proof Chain Validation", `Evidence: ${report.evidence_dir}`];

  for (const note of report.notes) {
    lines.push(`[WARN] ${note}`);
  }

  if (report.chains_validated.length > 0) {
    lines.push("");
    lines.push(
      renderAsciiTable(
        report.chains_validated.map((chain) => [
          chain.status === "valid" ? "OK" : "FAIL",
          chain.chain_name,
          String(chain.blocks),
          String(chain.hashes_verified),
        ]),
        ["Status", "Chain", "Blocks", "Hashes"],
      ),
    );
  }

  const { summary } = report;
  lines.push("");
  lines.push(`Total chains: ${summary.total_chains}`);
  lines.push(`Valid chains: ${summary.valid_chains}`);
  lines.push(`Invalid chains: ${summary.invalid_chains}`);
  lines.push(`Total blocks: ${summary.total_blocks}`);
  lines.push(`Hashes verified: ${summary.total_hashes_verified}`);
  lines.push(`Pass rate: ${formatPercent(passRate)}`);

  const failing = report.chains_validated.filter(
    (chain) => chain.status !== "valid",
  );
  if (failing.length > 0) {
    lines.push("");
    lines.push(
      `Sample errors (first ${Math.min(SAMPLE_ERRORS, failing.length)} of ${failing.length}):`,
    );
    for (const chain of failing.slice(0, SAMPLE_ERRORS)) {
      lines.push(`  ${chain.chain_name}`);
      for (const error of chain.errors.slice(0, 2)) {
        lines.push(`    - ${error}`);
      }
    }
  }

  return lines.join("\n");
}

/** Grade wording for a pass rate. */
export function chainGrade(passRate: number): string {
  if (passRate >= 90) {
    return "EXCELLENT: Merkle chains verified";
  }
  if (passRate >= 70) {
    return "GOOD: most chains valid";
  }
  if (passRate > 0) {
    return "NEEDS REVIEW: some chain issues detected";
  }
  return "No chains found or all chains have issues";
}
