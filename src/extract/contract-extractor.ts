import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { computeRuleHash } from "../merkle/hash.js";
import { toError, type Result } from "../result.js";
import type { ExtractionResult, LeafRecord, ProofWarning } from "./types.js";

const CONTENT_FIELDS = ["description", "priority", "category"] as const;

/**
 * Turn the `rules:` list of a YAML contract into leaf records.
 *
 * Never throws for file or format problems: those come back as warnings
 * together with whatever leaves could be read.
 */
export async function extractContractLeaves(
  contractPath: string,
  repoRoot: string,
): Promise<ExtractionResult> {
  const sourceFile = toRepoRelative(contractPath, repoRoot);
  const read = await readContract(contractPath);
  if (!read.ok) {
    const missing = isMissingFile(read.error);
    return {
      leaves: [],
      warnings: [
        {
          kind: missing ? "missing-source" : "unreadable-source",
          source: sourceFile,
          message: missing
            ? `Contract not found: ${sourceFile}`
            : `Failed to read ${sourceFile}: ${read.error.message}`,
        },
      ],
    };
  }
  const raw = read.value;

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      leaves: [],
      warnings: [
        {
          kind: "unreadable-source",
          source: sourceFile,
          message: `Failed to parse ${sourceFile}: ${reason}`,
        },
      ],
    };
  }

  const rules = isRecord(doc) ? doc.rules : undefined;
  if (!Array.isArray(rules)) {
    return {
      leaves: [],
      warnings: [
        {
          kind: "empty-source",
          source: sourceFile,
          message: `No rules list in ${sourceFile}`,
        },
      ],
    };
  }

  const leaves: LeafRecord[] = [];
  const warnings: ProofWarning[] = [];
  rules.forEach((rule: unknown, index: number) => {
    if (!isRecord(rule)) {
      warnings.push({
        kind: "invalid-rule",
        source: sourceFile,
        message: `Rule #${index + 1} in ${sourceFile} is not a mapping`,
      });
      return;
    }
    leaves.push(buildLeaf(rule, index, sourceFile));
  });

  return { leaves, warnings };
}

export function normalizeContractRule(rule: Record<string, unknown>): string {
  return CONTENT_FIELDS.map((field) => fieldText(rule[field])).join("|");
}

function buildLeaf(
  rule: Record<string, unknown>,
  index: number,
  sourceFile: string,
): LeafRecord {
  const ruleId =
    rule.id === undefined || rule.id === null
      ? `UNKNOWN_${index}`
      : String(rule.id);
  const normalized = normalizeContractRule(rule);
  return {
    rule_id: ruleId,
    normalized_content: normalized,
    hash: computeRuleHash(ruleId, normalized),
    source_file: sourceFile,
    line_number: index + 1,
  };
}

// Absent fields are empty; an explicit null and booleans keep the
// None/True/False spelling of proofs already on disk.
function fieldText(value: unknown): string {
  if (value === undefined) {
    return "";
  }
  if (value === null) {
    return "None";
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return JSON.stringify(value);
}

async function readContract(contractPath: string): Promise<Result<string>> {
  try {
    return { ok: true, value: await fs.readFile(contractPath, "utf8") };
  } catch (error) {
    return { ok: false, error: toError(error, "Contract read failed") };
  }
}

function isMissingFile(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}

export function toRepoRelative(filePath: string, repoRoot: string): string {
  return path
    .relative(repoRoot, path.resolve(repoRoot, filePath))
    .split(path.sep)
    .join(path.posix.sep);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
