import fs from "node:fs/promises";
import path from "node:path";
import {
  extractContractLeaves,
  toRepoRelative,
} from "../extract/contract-extractor.js";
import type { LeafRecord, ProofWarning } from "../extract/types.js";
import { buildMerkleTree } from "../merkle/tree-builder.js";
import {
  VERIFICATION_METHOD,
  type GenerationResult,
  type LeafOrder,
  type ProofConfig,
  type ProofDocument,
} from "./types.js";

export interface GenerateOptions {
  readonly now?: Date;
}

/**
 * Extract every configured contract and commit to the collected leaves with
 * a single Merkle root. Missing or unreadable contracts do not fail the run;
 * they show up in `warnings`.
 */
export async function generateProof(
  config: ProofConfig,
  options: GenerateOptions = {},
): Promise<GenerationResult> {
  const leaves: LeafRecord[] = [];
  const warnings: ProofWarning[] = [];
  const sourceFiles: string[] = [];

  for (const contract of config.contracts) {
    const extracted = await extractContractLeaves(contract, config.repoRoot);
    warnings.push(...extracted.warnings);
    if (extracted.leaves.length > 0) {
      leaves.push(...extracted.leaves);
      sourceFiles.push(toRepoRelative(contract, config.repoRoot));
    }
  }

  const ordered = orderLeaves(leaves, config.leafOrder);
  warnings.push(...findDuplicateRuleIds(ordered));
  if (ordered.length === 0) {
    warnings.push({
      kind: "empty-source",
      source: config.contracts
        .map((contract) => toRepoRelative(contract, config.repoRoot))
        .join(", "),
      message: "No rules found; proof commits to an empty rule set",
    });
  }

  const tree = buildMerkleTree(ordered.map((leaf) => leaf.hash));
  const proof: ProofDocument = {
    merkle_root: tree.rootHash,
    total_rules: ordered.length,
    rule_hashes: ordered,
    timestamp: (options.now ?? new Date()).toISOString(),
    source_files: sourceFiles,
    tree_depth: tree.depth,
    verification_method: VERIFICATION_METHOD,
  };

  return { proof, warnings };
}

export async function writeProof(
  outputPath: string,
  proof: ProofDocument,
): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, JSON.stringify(proof, null, 2), "utf8");
}

export function orderLeaves(
  leaves: readonly LeafRecord[],
  order: LeafOrder,
): LeafRecord[] {
  if (order === "source") {
    return [...leaves];
  }
  // Code-unit comparison; localeCompare would tie the root to the host locale.
  return [...leaves].sort((a, b) => {
    if (a.rule_id === b.rule_id) {
      return 0;
    }
    return a.rule_id < b.rule_id ? -1 : 1;
  });
}

function findDuplicateRuleIds(leaves: readonly LeafRecord[]): ProofWarning[] {
  const seen = new Map<string, LeafRecord>();
  const warnings: ProofWarning[] = [];
  for (const leaf of leaves) {
    const first = seen.get(leaf.rule_id);
    if (!first) {
      seen.set(leaf.rule_id, leaf);
      continue;
    }
    warnings.push({
      kind: "duplicate-rule-id",
      source: leaf.source_file,
      message: `Rule ${leaf.rule_id} appears at ${first.source_file}#${first.line_number} and ${leaf.source_file}#${leaf.line_number}`,
    });
  }
  return warnings;
}
