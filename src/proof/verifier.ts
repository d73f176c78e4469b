import fs from "node:fs/promises";
import { buildMerkleTree } from "../merkle/tree-builder.js";
import { toError, type Result } from "../result.js";
import type {
  VerifiableProof,
  VerificationOutcome,
  VerifyOptions,
} from "./types.js";

/**
 * Rebuild the tree from the proof's embedded leaf hashes, in stored order,
 * and compare against the stored root. Strict mode also checks the recorded
 * rule count and depth.
 */
export function verifyProofDocument(
  proof: VerifiableProof,
  options: VerifyOptions = {},
): VerificationOutcome {
  const tree = buildMerkleTree(proof.rule_hashes.map((entry) => entry.hash));
  const issues: string[] = [];

  const rootsMatch = tree.rootHash === proof.merkle_root;
  if (!rootsMatch) {
    issues.push("Merkle root mismatch");
  }

  if (options.strict) {
    if (
      proof.total_rules !== undefined &&
      proof.total_rules !== tree.leafCount
    ) {
      issues.push(
        `total_rules is ${proof.total_rules} but ${tree.leafCount} rule hashes are present`,
      );
    }
    if (proof.tree_depth !== undefined && proof.tree_depth !== tree.depth) {
      issues.push(
        `tree_depth is ${proof.tree_depth} but the rebuilt tree has depth ${tree.depth}`,
      );
    }
  }

  return {
    valid: issues.length === 0,
    storedRoot: proof.merkle_root,
    rebuiltRoot: tree.rootHash,
    leafCount: tree.leafCount,
    depth: tree.depth,
    issues,
  };
}

export function parseProofDocument(input: unknown): Result<VerifiableProof> {
  if (!isRecord(input)) {
    return { ok: false, error: new Error("Proof must be a JSON object") };
  }
  if (typeof input.merkle_root !== "string") {
    return { ok: false, error: new Error("Proof is missing merkle_root") };
  }
  if (!Array.isArray(input.rule_hashes)) {
    return { ok: false, error: new Error("Proof is missing rule_hashes") };
  }

  const ruleHashes: { hash: string }[] = [];
  for (const [index, entry] of input.rule_hashes.entries()) {
    if (!isRecord(entry) || typeof entry.hash !== "string") {
      return {
        ok: false,
        error: new Error(`rule_hashes[${index}] has no hash`),
      };
    }
    ruleHashes.push({ hash: entry.hash });
  }

  return {
    ok: true,
    value: {
      merkle_root: input.merkle_root,
      rule_hashes: ruleHashes,
      total_rules: optionalNumber(input.total_rules),
      tree_depth: optionalNumber(input.tree_depth),
    },
  };
}

/**
 * Load and verify a persisted proof. A missing file or malformed JSON is a
 * failed result, not an exception.
 */
export async function verifyProofFile(
  proofPath: string,
  options: VerifyOptions = {},
): Promise<Result<VerificationOutcome>> {
  let raw: string;
  try {
    raw = await fs.readFile(proofPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {
        ok: false,
        error: new Error(`Proof file not found: ${proofPath}`),
      };
    }
    return { ok: false, error: toError(error, "Proof read failed") };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = toError(error, "invalid JSON").message;
    return {
      ok: false,
      error: new Error(`Malformed proof ${proofPath}: ${reason}`),
    };
  }

  const proof = parseProofDocument(parsed);
  if (!proof.ok) {
    return {
      ok: false,
      error: new Error(`Malformed proof ${proofPath}: ${proof.error.message}`),
    };
  }

  return { ok: true, value: verifyProofDocument(proof.value, options) };
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
