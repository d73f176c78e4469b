import fs from "node:fs/promises";
import {
  MANIFESTATION_TYPES,
  type ComplianceRegistry,
  type Manifestation,
  type ManifestationType,
  type RegistryRule,
  type RegistryStandard,
} from "./types.js";

export async function loadRegistry(
  registryPath: string,
): Promise<ComplianceRegistry> {
  let raw: string;
  try {
    raw = await fs.readFile(registryPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new Error(`Registry not found: ${registryPath}`);
    }
    throw error;
  }
  const parsed: unknown = JSON.parse(raw);
  return parseRegistry(parsed);
}

/**
 * Validate a parsed registry, collecting every shape problem before failing.
 */
export function parseRegistry(input: unknown): ComplianceRegistry {
  const errors: string[] = [];
  if (!isRecord(input)) {
    throw new Error("Invalid registry: registry must be an object");
  }

  const metadata: Record<string, unknown> = isRecord(input.metadata)
    ? input.metadata
    : {};
  if (!isRecord(input.metadata)) {
    errors.push("metadata must be an object");
  }

  const standards: Record<string, RegistryStandard> = {};
  if (!isRecord(input.standards)) {
    errors.push("standards must be an object");
  } else {
    for (const [key, value] of Object.entries(input.standards)) {
      standards[key] = parseStandard(value, `standards.${key}`, errors);
    }
  }

  if (errors.length > 0) {
    throw new Error(`Invalid registry: ${errors.join("; ")}`);
  }

  return {
    metadata: {
      total_rules:
        typeof metadata.total_rules === "number"
          ? metadata.total_rules
          : countRules(standards),
      generated_at:
        typeof metadata.generated_at === "string"
          ? metadata.generated_at
          : "unknown",
    },
    standards,
  };
}

function parseStandard(
  input: unknown,
  label: string,
  errors: string[],
): RegistryStandard {
  if (!isRecord(input)) {
    errors.push(`${label} must be an object`);
    return { name: "", rules: {} };
  }
  const rules: Record<string, RegistryRule> = {};
  if (!isRecord(input.rules)) {
    errors.push(`${label}.rules must be an object`);
  } else {
    for (const [ruleId, value] of Object.entries(input.rules)) {
      const rule = parseRule(value, ruleId, `${label}.rules.${ruleId}`, errors);
      if (rule) {
        rules[ruleId] = rule;
      }
    }
  }
  return {
    name: typeof input.name === "string" ? input.name : label,
    rules,
  };
}

function parseRule(
  input: unknown,
  ruleId: string,
  label: string,
  errors: string[],
): RegistryRule | null {
  if (!isRecord(input)) {
    errors.push(`${label} must be an object`);
    return null;
  }
  const tree = input.merkle_tree;
  if (!isRecord(tree) || typeof tree.root_hash !== "string") {
    errors.push(`${label}.merkle_tree.root_hash must be a string`);
    return null;
  }
  if (!isRecord(input.manifestations)) {
    errors.push(`${label}.manifestations must be an object`);
    return null;
  }

  const manifestations: Partial<Record<ManifestationType, Manifestation>> = {};
  for (const type of MANIFESTATION_TYPES) {
    const entry = input.manifestations[type];
    if (
      !isRecord(entry) ||
      typeof entry.path !== "string" ||
      typeof entry.hash !== "string"
    ) {
      errors.push(`${label}.manifestations.${type} needs path and hash`);
      return null;
    }
    manifestations[type] = { path: entry.path, hash: entry.hash };
  }

  const { python, rego, yaml, cli } = manifestations;
  if (!python || !rego || !yaml || !cli) {
    return null;
  }

  return {
    rule_id: typeof input.rule_id === "string" ? input.rule_id : ruleId,
    name: typeof input.name === "string" ? input.name : ruleId,
    manifestations: { python, rego, yaml, cli },
    merkle_tree: { root_hash: tree.root_hash },
  };
}

function countRules(standards: Record<string, RegistryStandard>): number {
  return Object.values(standards).reduce(
    (total, standard) => total + Object.keys(standard.rules).length,
    0,
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
