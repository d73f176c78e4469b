import type { LeafRecord, ProofWarning } from "../extract/types.js";

export const VERIFICATION_METHOD = "merkle_tree_sha256";

export type LeafOrder = "source" | "rule-id";

export interface ProofDocument {
  readonly merkle_root: string;
  readonly total_rules: number;
  readonly rule_hashes: readonly LeafRecord[];
  readonly timestamp: string;
  readonly source_files: readonly string[];
  readonly tree_depth: number;
  readonly verification_method: typeof VERIFICATION_METHOD;
}

/** The parts of a proof document the verifier reads. */
export interface VerifiableProof {
  readonly merkle_root: string;
  readonly rule_hashes: readonly { readonly hash: string }[];
  readonly total_rules?: number;
  readonly tree_depth?: number;
}

export interface VerificationOutcome {
  readonly valid: boolean;
  readonly storedRoot: string;
  readonly rebuiltRoot: string;
  readonly leafCount: number;
  readonly depth: number;
  readonly issues: readonly string[];
}

export interface VerifyOptions {
  readonly strict?: boolean;
}

export interface ProofConfig {
  readonly repoRoot: string;
  readonly contracts: readonly string[];
  readonly outputPath: string;
  readonly leafOrder: LeafOrder;
  readonly registryPath: string;
  readonly evidenceDir: string;
  readonly reportsDir: string;
}

export interface GenerationResult {
  readonly proof: ProofDocument;
  readonly warnings: readonly ProofWarning[];
}
