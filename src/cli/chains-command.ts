import {
  chainPassRate,
  validateEvidenceDirectory,
  writeChainReport,
} from "../chain/chain-validator.js";
import { toRepoRelative } from "../extract/contract-extractor.js";
import { chainGrade, renderChainReport } from "../report/chain-reporter.js";
import { formatPercent } from "../report/report-utils.js";
import { loadCommandConfig } from "./runtime-paths.js";
import type { CommandResult, RepoOptions } from "./types.js";

export interface ChainsOptions extends RepoOptions {
  readonly evidenceDir?: string;
  readonly reportsDir?: string;
  readonly failUnder?: number;
  readonly now?: Date;
}

export async function runChainsCommand(
  options: ChainsOptions,
): Promise<CommandResult> {
  const config = await loadCommandConfig(options, {
    evidenceDir: options.evidenceDir,
    reportsDir: options.reportsDir,
  });
  const report = await validateEvidenceDirectory(config.evidenceDir, options.now);
  const reportPath = await writeChainReport(config.reportsDir, report);
  const passRate = chainPassRate(report);

  const output = [
    renderChainReport(report, passRate),
    "",
    `Results saved: ${toRepoRelative(reportPath, config.repoRoot)}`,
  ].join("\n");

  if (options.failUnder !== undefined && passRate < options.failUnder) {
    return {
      output,
      verdict: `FAIL Pass rate ${formatPercent(passRate)} is below ${formatPercent(options.failUnder)}`,
      exitCode: 2,
    };
  }
  return {
    output,
    verdict: `${passRate >= 70 ? "PASS" : "WARN"} ${chainGrade(passRate)}`,
    exitCode: 0,
  };
}
