export interface LeafRecord {
  readonly rule_id: string;
  readonly normalized_content: string;
  readonly hash: string;
  readonly source_file: string;
  readonly line_number: number;
}

export type ProofWarningKind =
  | "missing-source"
  | "unreadable-source"
  | "empty-source"
  | "invalid-rule"
  | "duplicate-rule-id";

export interface ProofWarning {
  readonly kind: ProofWarningKind;
  readonly source: string;
  readonly message: string;
}

export interface ExtractionResult {
  readonly leaves: LeafRecord[];
  readonly warnings: ProofWarning[];
}
