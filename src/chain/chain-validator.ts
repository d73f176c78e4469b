import fs from "node:fs/promises";
import path from "node:path";
import { isSha256Hex } from "../merkle/hash.js";
import { buildMerkleTree } from "../merkle/tree-builder.js";
import { parseProofDocument, verifyProofDocument } from "../proof/verifier.js";
import { toError } from "../result.js";
import type {
  ChainReport,
  ChainSummary,
  ChainValidation,
} from "./types.js";

export const CHAIN_REPORT_FILE = "merkle_proof_validation.json";

const CHAIN_FILE_PATTERNS = [/proof_chain/, /merkle/, /continuum/];

interface Tally {
  errors: string[];
  notes: string[];
  blocks: number;
  hashesVerified: number;
}

/**
 * Check one parsed evidence document. Recognised sections: `merkle_root`,
 * `blocks`, `proofs`, `hashes` and `rule_hashes`; a top-level array is
 * treated as a list of hash entries.
 */
export function validateChainDocument(
  chainName: string,
  chainFile: string,
  data: unknown,
): ChainValidation {
  const tally: Tally = { errors: [], notes: [], blocks: 0, hashesVerified: 0 };

  if (Array.isArray(data)) {
    data.forEach((entry: unknown, index: number) => {
      if (isRecord(entry) && "hash" in entry) {
        checkHash(tally, entry.hash, `Entry ${index}: Invalid hash format`);
      }
    });
  } else if (isRecord(data)) {
    validateObjectDocument(tally, data);
  } else {
    tally.errors.push("Document must be a JSON object or array");
  }

  return {
    chain_name: chainName,
    chain_file: chainFile,
    status: tally.errors.length === 0 ? "valid" : "invalid",
    errors: tally.errors,
    notes: tally.notes,
    blocks: tally.blocks,
    hashes_verified: tally.hashesVerified,
  };
}

export async function findChainFiles(evidenceDir: string): Promise<string[]> {
  const entries = await fs.readdir(evidenceDir, { withFileTypes: true });
  return entries
    .filter(
      (entry) =>
        entry.isFile() &&
        entry.name.endsWith(".json") &&
        CHAIN_FILE_PATTERNS.some((pattern) => pattern.test(entry.name)),
    )
    .map((entry) => path.join(evidenceDir, entry.name))
    .sort();
}

export async function validateChainFile(
  chainFile: string,
): Promise<ChainValidation> {
  const chainName = path.basename(chainFile, path.extname(chainFile));
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(chainFile, "utf8"));
  } catch (error) {
    const reason = toError(error, "unreadable file").message;
    const label =
      error instanceof SyntaxError ? "JSON parsing error" : "Validation error";
    return {
      chain_name: chainName,
      chain_file: chainFile,
      status: "error",
      errors: [`${label}: ${reason}`],
      notes: [],
      blocks: 0,
      hashes_verified: 0,
    };
  }
  return validateChainDocument(chainName, chainFile, data);
}

export async function validateEvidenceDirectory(
  evidenceDir: string,
  now: Date = new Date(),
): Promise<ChainReport> {
  const timestamp = now.toISOString();
  if (!(await isDirectory(evidenceDir))) {
    return emptyReport(timestamp, evidenceDir, [
      `Evidence directory not found: ${evidenceDir}`,
    ]);
  }

  const files = await findChainFiles(evidenceDir);
  if (files.length === 0) {
    return emptyReport(timestamp, evidenceDir, [
      `No Merkle proof chain files found in ${evidenceDir}`,
    ]);
  }

  const results: ChainValidation[] = [];
  for (const file of files) {
    results.push(await validateChainFile(file));
  }

  return {
    timestamp,
    evidence_dir: evidenceDir,
    chains_validated: results,
    summary: summarize(results),
    notes: [],
  };
}

/** Percentage of valid chains; 0 when nothing was validated. */
export function chainPassRate(report: ChainReport): number {
  if (report.summary.total_chains === 0) {
    return 0;
  }
  return (report.summary.valid_chains / report.summary.total_chains) * 100;
}

export async function writeChainReport(
  reportsDir: string,
  report: ChainReport,
): Promise<string> {
  await fs.mkdir(reportsDir, { recursive: true });
  const reportPath = path.join(reportsDir, CHAIN_REPORT_FILE);
  await fs.writeFile(reportPath, JSON.stringify(report, null, 2), "utf8");
  return reportPath;
}

function validateObjectDocument(
  tally: Tally,
  data: Record<string, unknown>,
): void {
  const hasRoot = "merkle_root" in data;
  if (hasRoot) {
    checkHash(
      tally,
      data.merkle_root,
      `Invalid merkle_root format: ${String(data.merkle_root)}`,
    );
  }

  if ("blocks" in data) {
    validateBlocks(tally, data.blocks);
  }

  if (Array.isArray(data.proofs)) {
    data.proofs.forEach((proof: unknown, index: number) => {
      if (isRecord(proof) && "hash" in proof) {
        checkHash(tally, proof.hash, `Proof ${index}: Invalid hash format`);
      }
    });
  }

  if ("hashes" in data) {
    validateHashList(tally, data.hashes, hasRoot ? data.merkle_root : undefined);
  }

  if (hasRoot && "rule_hashes" in data) {
    validateEmbeddedProof(tally, data);
  }
}

function validateBlocks(tally: Tally, blocks: unknown): void {
  if (!Array.isArray(blocks)) {
    tally.errors.push("blocks must be an array");
    return;
  }
  tally.blocks += blocks.length;

  let previousHash: unknown = null;
  blocks.forEach((block: unknown, index: number) => {
    if (!isRecord(block)) {
      tally.errors.push(`Block ${index}: not an object`);
      return;
    }
    const blockHash = block.block_hash;
    if (blockHash !== undefined && blockHash !== null && blockHash !== "") {
      checkHash(tally, blockHash, `Block ${index}: Invalid block_hash format`);
    }
    if (index > 0 && (block.previous_hash ?? null) !== previousHash) {
      tally.errors.push(`Block ${index}: Chain discontinuity detected`);
    }
    previousHash = blockHash ?? null;

    if ("merkle_root" in block) {
      checkHash(
        tally,
        block.merkle_root,
        `Block ${index}: Invalid merkle_root format`,
      );
    }
  });
}

function validateHashList(
  tally: Tally,
  hashes: unknown,
  expectedRoot: unknown,
): void {
  if (!Array.isArray(hashes)) {
    tally.errors.push("hashes must be an array");
    return;
  }
  const leafHashes: string[] = [];
  hashes.forEach((value: unknown, index: number) => {
    if (checkHash(tally, value, `Hash ${index}: Invalid format`)) {
      leafHashes.push(value);
    }
  });

  if (expectedRoot === undefined) {
    return;
  }
  if (leafHashes.length !== hashes.length) {
    tally.errors.push("Merkle root not recomputed: hash list is malformed");
    return;
  }
  const computedRoot = computeChainRoot(leafHashes);
  if (computedRoot === null || computedRoot !== expectedRoot) {
    tally.errors.push(
      `Merkle root mismatch: expected ${String(expectedRoot)}, computed ${computedRoot ?? "none"}`,
    );
  } else {
    tally.notes.push("Merkle root verified successfully");
  }
}

/**
 * Root of a chain file's hash list. A lone hash is paired with itself, so
 * the root of `[h]` is `sha256(h + h)`. An empty list has no root.
 */
export function computeChainRoot(hashes: readonly string[]): string | null {
  const [first] = hashes;
  if (first === undefined) {
    return null;
  }
  return buildMerkleTree(hashes.length === 1 ? [first, first] : hashes)
    .rootHash;
}

function validateEmbeddedProof(
  tally: Tally,
  data: Record<string, unknown>,
): void {
  const parsed = parseProofDocument(data);
  if (!parsed.ok) {
    tally.errors.push(`Proof document malformed: ${parsed.error.message}`);
    return;
  }
  const outcome = verifyProofDocument(parsed.value);
  if (outcome.valid) {
    tally.notes.push(
      `Proof-of-detection verified over ${outcome.leafCount} rules`,
    );
    return;
  }
  tally.errors.push(
    `Proof-of-detection root mismatch: stored ${outcome.storedRoot}, rebuilt ${outcome.rebuiltRoot}`,
  );
}

function checkHash(
  tally: Tally,
  value: unknown,
  message: string,
): value is string {
  if (!isSha256Hex(value)) {
    tally.errors.push(message);
    return false;
  }
  tally.hashesVerified += 1;
  return true;
}

function summarize(results: readonly ChainValidation[]): ChainSummary {
  return {
    total_chains: results.length,
    valid_chains: results.filter((result) => result.status === "valid").length,
    invalid_chains: results.filter((result) => result.status !== "valid")
      .length,
    total_blocks: results.reduce((total, result) => total + result.blocks, 0),
    total_hashes_verified: results.reduce(
      (total, result) => total + result.hashes_verified,
      0,
    ),
  };
}

function emptyReport(
  timestamp: string,
  evidenceDir: string,
  notes: string[],
): ChainReport {
  return {
    timestamp,
    evidence_dir: evidenceDir,
    chains_validated: [],
    summary: summarize([]),
    notes,
  };
}

async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
