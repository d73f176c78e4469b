import type {
  RegistryReport,
  RuleStatus,
  RuleVerification,
} from "../registry/types.js";
import { RULE, truncateHash } from "./report-utils.js";

export interface RegistryRenderOptions {
  readonly verbose?: boolean;
}

const STATUS_LABEL: Record<RuleStatus, string> = {
  valid: "OK",
  partial: "WARN",
  invalid: "FAIL",
};

export function renderRegistryReport(
  report: RegistryReport,
  options: RegistryRenderOptions = {},
): string {
  const { summary } = report;
  const lines = [
    "Real-Time Compliance Verification",
    `Timestamp: ${report.timestamp}`,
    "",
    "Summary:",
    `  Total Rules:   ${summary.total_rules}`,
    `  Valid:         ${summary.valid_rules} (Merkle verified)`,
    `  Partial:       ${summary.partial_rules} (some manifestations match)`,
    `  Invalid:       ${summary.invalid_rules} (Merkle mismatch)`,
  ];

  for (const standard of report.standards) {
    lines.push("");
    lines.push(`[${standard.key.toUpperCase()}] ${standard.name}`);
    lines.push("-".repeat(80));
    for (const rule of standard.rules) {
      lines.push(`  [${STATUS_LABEL[rule.status]}] ${rule.rule_id} - ${rule.name}`);
      if (options.verbose || rule.status !== "valid") {
        lines.push(...renderRuleDetail(rule, options.verbose ?? false));
      }
    }
  }

  return lines.join("\n");
}

export function renderRuleReport(
  standardKey: string,
  rule: RuleVerification,
): string {
  const lines = [
    `Verifying ${standardKey.toUpperCase()} ${rule.rule_id} - ${rule.name}`,
    RULE,
    `Expected Merkle Root:   ${rule.expected_root}`,
    `Calculated Merkle Root: ${rule.calculated_root}`,
    "",
    "Manifestations:",
  ];
  for (const [type, valid] of Object.entries(rule.manifestations_valid)) {
    lines.push(`  ${type.padEnd(10)}: ${valid ? "OK" : "FAIL"}`);
  }
  if (rule.hash_mismatches.length > 0) {
    lines.push("");
    lines.push("Hash Mismatches:");
    for (const mismatch of rule.hash_mismatches) {
      lines.push(`  ${mismatch.type.toUpperCase()}:`);
      lines.push(`    Path:     ${mismatch.path}`);
      lines.push(`    Exists:   ${mismatch.exists}`);
      lines.push(`    Expected: ${mismatch.expected}`);
      lines.push(`    Actual:   ${mismatch.actual}`);
    }
  }
  return lines.join("\n");
}

function renderRuleDetail(rule: RuleVerification, verbose: boolean): string[] {
  const lines: string[] = [];
  for (const [type, valid] of Object.entries(rule.manifestations_valid)) {
    lines.push(`       ${type.padEnd(8)}: ${valid ? "OK" : "FAIL"}`);
  }
  if (!rule.merkle_valid) {
    lines.push("       Merkle Root: MISMATCH");
    lines.push(`         Expected: ${truncateHash(rule.expected_root)}`);
    lines.push(`         Actual:   ${truncateHash(rule.calculated_root)}`);
  }
  if (verbose) {
    for (const mismatch of rule.hash_mismatches) {
      lines.push(`       ${mismatch.type} mismatch:`);
      lines.push(`         Expected: ${truncateHash(mismatch.expected, 32)}`);
      lines.push(`         Actual:   ${truncateHash(mismatch.actual, 32)}`);
      lines.push(`         Exists:   ${mismatch.exists}`);
    }
  }
  return lines;
}
