export const MANIFESTATION_TYPES = ["python", "rego", "yaml", "cli"] as const;

export type ManifestationType = (typeof MANIFESTATION_TYPES)[number];

export interface Manifestation {
  readonly path: string;
  readonly hash: string;
}

export interface RegistryRule {
  readonly rule_id: string;
  readonly name: string;
  readonly manifestations: Readonly<Record<ManifestationType, Manifestation>>;
  readonly merkle_tree: { readonly root_hash: string };
}

export interface RegistryStandard {
  readonly name: string;
  readonly rules: Readonly<Record<string, RegistryRule>>;
}

export interface RegistryMetadata {
  readonly total_rules: number;
  readonly generated_at: string;
}

export interface ComplianceRegistry {
  readonly metadata: RegistryMetadata;
  readonly standards: Readonly<Record<string, RegistryStandard>>;
}

export interface HashMismatch {
  readonly type: ManifestationType;
  readonly expected: string;
  readonly actual: string;
  readonly path: string;
  readonly exists: boolean;
}

export type RuleStatus = "valid" | "partial" | "invalid";

export interface RuleVerification {
  readonly rule_id: string;
  readonly name: string;
  readonly status: RuleStatus;
  readonly manifestations_valid: Readonly<Record<ManifestationType, boolean>>;
  readonly merkle_valid: boolean;
  readonly expected_root: string;
  readonly calculated_root: string;
  readonly hash_mismatches: readonly HashMismatch[];
}

export interface StandardVerification {
  readonly key: string;
  readonly name: string;
  readonly rules: readonly RuleVerification[];
}

export interface RegistrySummary {
  readonly total_rules: number;
  readonly valid_rules: number;
  readonly partial_rules: number;
  readonly invalid_rules: number;
}

export interface RegistryReport {
  readonly timestamp: string;
  readonly standards: readonly StandardVerification[];
  readonly summary: RegistrySummary;
}
