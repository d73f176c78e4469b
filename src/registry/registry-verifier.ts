import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { EMPTY_ROOT } from "../merkle/hash.js";
import { buildMerkleTree } from "../merkle/tree-builder.js";
import type { Result } from "../result.js";
import {
  MANIFESTATION_TYPES,
  type ComplianceRegistry,
  type HashMismatch,
  type ManifestationType,
  type RegistryReport,
  type RegistryRule,
  type RuleVerification,
  type StandardVerification,
} from "./types.js";

/** SHA-256 of a file's bytes; a missing or unreadable file hashes to zeros. */
export async function hashFile(filePath: string): Promise<string> {
  try {
    const data = await fs.readFile(filePath);
    return crypto.createHash("sha256").update(data).digest("hex");
  } catch {
    return EMPTY_ROOT;
  }
}

/**
 * Recompute the manifestation hashes of one rule and rebuild its Merkle root.
 * Leaves are taken in the fixed order python, rego, yaml, cli.
 */
export async function verifyRegistryRule(
  rule: RegistryRule,
  repoRoot: string,
): Promise<RuleVerification> {
  const leafHashes: string[] = [];
  const mismatches: HashMismatch[] = [];
  const manifestationsValid: Record<ManifestationType, boolean> = {
    python: false,
    rego: false,
    yaml: false,
    cli: false,
  };

  for (const type of MANIFESTATION_TYPES) {
    const manifestation = rule.manifestations[type];
    const filePath = path.resolve(
      repoRoot,
      manifestation.path.replace(/\\/g, "/"),
    );
    const actual = await hashFile(filePath);
    leafHashes.push(actual);

    const matches = actual === manifestation.hash;
    manifestationsValid[type] = matches;
    if (!matches) {
      mismatches.push({
        type,
        expected: manifestation.hash,
        actual,
        path: filePath,
        exists: await fileExists(filePath),
      });
    }
  }

  const calculatedRoot = buildMerkleTree(leafHashes).rootHash;
  const merkleValid = calculatedRoot === rule.merkle_tree.root_hash;
  const allManifestationsValid = mismatches.length === 0;

  return {
    rule_id: rule.rule_id,
    name: rule.name,
    status: ruleStatus(allManifestationsValid, merkleValid, manifestationsValid),
    manifestations_valid: manifestationsValid,
    merkle_valid: merkleValid,
    expected_root: rule.merkle_tree.root_hash,
    calculated_root: calculatedRoot,
    hash_mismatches: mismatches,
  };
}

export async function verifyRegistry(
  registry: ComplianceRegistry,
  repoRoot: string,
  now: Date = new Date(),
): Promise<RegistryReport> {
  const standards: StandardVerification[] = [];
  let valid = 0;
  let partial = 0;
  let invalid = 0;

  for (const [key, standard] of Object.entries(registry.standards)) {
    const rules: RuleVerification[] = [];
    for (const rule of Object.values(standard.rules)) {
      const result = await verifyRegistryRule(rule, repoRoot);
      rules.push(result);
      switch (result.status) {
        case "valid":
          valid += 1;
          break;
        case "partial":
          partial += 1;
          break;
        case "invalid":
          invalid += 1;
          break;
      }
    }
    standards.push({ key, name: standard.name, rules });
  }

  return {
    timestamp: now.toISOString(),
    standards,
    summary: {
      total_rules: valid + partial + invalid,
      valid_rules: valid,
      partial_rules: partial,
      invalid_rules: invalid,
    },
  };
}

export async function verifySingleRule(
  registry: ComplianceRegistry,
  standardKey: string,
  ruleId: string,
  repoRoot: string,
): Promise<Result<RuleVerification>> {
  const standard = registry.standards[standardKey];
  if (!standard) {
    return {
      ok: false,
      error: new Error(`Unknown standard: ${standardKey}`),
    };
  }
  const rule = standard.rules[ruleId];
  if (!rule) {
    return {
      ok: false,
      error: new Error(`Unknown rule: ${ruleId} in ${standardKey}`),
    };
  }
  return { ok: true, value: await verifyRegistryRule(rule, repoRoot) };
}

export function isRegistryCompliant(report: RegistryReport): boolean {
  return (
    report.summary.invalid_rules === 0 && report.summary.partial_rules === 0
  );
}

function ruleStatus(
  allManifestationsValid: boolean,
  merkleValid: boolean,
  manifestationsValid: Record<ManifestationType, boolean>,
): RuleVerification["status"] {
  if (allManifestationsValid && merkleValid) {
    return "valid";
  }
  if (Object.values(manifestationsValid).some(Boolean)) {
    return "partial";
  }
  return "invalid";
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
