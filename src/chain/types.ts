export type ChainStatus = "valid" | "invalid" | "error";

export interface ChainValidation {
  readonly chain_name: string;
  readonly chain_file: string;
  readonly status: ChainStatus;
  readonly errors: readonly string[];
  readonly notes: readonly string[];
  readonly blocks: number;
  readonly hashes_verified: number;
}

export interface ChainSummary {
  readonly total_chains: number;
  readonly valid_chains: number;
  readonly invalid_chains: number;
  readonly total_blocks: number;
  readonly total_hashes_verified: number;
}

export interface ChainReport {
  readonly timestamp: string;
  readonly evidence_dir: string;
  readonly chains_validated: readonly ChainValidation[];
  readonly summary: ChainSummary;
  readonly notes: readonly string[];
}
