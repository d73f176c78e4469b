import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import type { LeafOrder, ProofConfig } from "./types.js";

export const CONFIG_FILE = "merkle-audit.yaml";

const DEFAULT_CONTRACT = "16_codex/contracts/sot/sot_contract.yaml";
const DEFAULT_OUTPUT = "02_audit_logging/proof/proof_of_detection.json";
const DEFAULT_REGISTRY = "23_compliance/registry/compliance_registry.json";
const DEFAULT_EVIDENCE_DIR = "02_audit_logging/evidence";
const DEFAULT_REPORTS_DIR = "02_audit_logging/reports";

const CONFIG_KEYS = new Set([
  "contracts",
  "output",
  "leaf_order",
  "registry",
  "evidence_dir",
  "reports_dir",
]);

export interface LoadConfigOptions {
  readonly repoRoot: string;
  readonly configPath?: string;
}

export interface ConfigOverrides {
  readonly contracts?: readonly string[];
  readonly output?: string;
  readonly leafOrder?: LeafOrder;
  readonly registry?: string;
  readonly evidenceDir?: string;
  readonly reportsDir?: string;
}

export function defaultProofConfig(repoRoot: string): ProofConfig {
  const root = path.resolve(repoRoot);
  return {
    repoRoot: root,
    contracts: [path.join(root, DEFAULT_CONTRACT)],
    outputPath: path.join(root, DEFAULT_OUTPUT),
    leafOrder: "source",
    registryPath: path.join(root, DEFAULT_REGISTRY),
    evidenceDir: path.join(root, DEFAULT_EVIDENCE_DIR),
    reportsDir: path.join(root, DEFAULT_REPORTS_DIR),
  };
}

/**
 * Resolve the configuration for a repository. An explicit config path must
 * exist; the default `merkle-audit.yaml` is optional.
 */
export async function loadProofConfig(
  options: LoadConfigOptions,
): Promise<ProofConfig> {
  const defaults = defaultProofConfig(options.repoRoot);
  const configPath = options.configPath
    ? path.resolve(options.configPath)
    : path.join(defaults.repoRoot, CONFIG_FILE);

  const raw = await readConfigFile(configPath, Boolean(options.configPath));
  if (raw === null) {
    return defaults;
  }

  const overrides = parseConfig(yaml.load(raw), configPath);
  return applyConfigOverrides(defaults, overrides);
}

export function applyConfigOverrides(
  config: ProofConfig,
  overrides: ConfigOverrides,
): ProofConfig {
  const resolve = (input: string): string =>
    path.resolve(config.repoRoot, input);
  return {
    repoRoot: config.repoRoot,
    contracts:
      overrides.contracts && overrides.contracts.length > 0
        ? overrides.contracts.map(resolve)
        : config.contracts,
    outputPath: overrides.output ? resolve(overrides.output) : config.outputPath,
    leafOrder: overrides.leafOrder ?? config.leafOrder,
    registryPath: overrides.registry
      ? resolve(overrides.registry)
      : config.registryPath,
    evidenceDir: overrides.evidenceDir
      ? resolve(overrides.evidenceDir)
      : config.evidenceDir,
    reportsDir: overrides.reportsDir
      ? resolve(overrides.reportsDir)
      : config.reportsDir,
  };
}

export function parseLeafOrder(value: unknown): LeafOrder | undefined {
  if (value === "source" || value === "rule-id") {
    return value;
  }
  return undefined;
}

function parseConfig(input: unknown, configPath: string): ConfigOverrides {
  if (input === undefined || input === null) {
    return {};
  }

  const errors: string[] = [];
  if (!isRecord(input)) {
    throw new Error(`Invalid config: ${configPath} must be a mapping`);
  }

  for (const key of Object.keys(input)) {
    if (!CONFIG_KEYS.has(key)) {
      errors.push(`unknown key '${key}'`);
    }
  }

  const contracts = parseStringList(input.contracts, "contracts", errors);
  const output = parseString(input.output, "output", errors);
  const registry = parseString(input.registry, "registry", errors);
  const evidenceDir = parseString(input.evidence_dir, "evidence_dir", errors);
  const reportsDir = parseString(input.reports_dir, "reports_dir", errors);

  let leafOrder: LeafOrder | undefined;
  if (input.leaf_order !== undefined) {
    leafOrder = parseLeafOrder(input.leaf_order);
    if (!leafOrder) {
      errors.push("leaf_order must be 'source' or 'rule-id'");
    }
  }

  if (errors.length > 0) {
    throw new Error(`Invalid config ${configPath}: ${errors.join("; ")}`);
  }

  return { contracts, output, leafOrder, registry, evidenceDir, reportsDir };
}

function parseString(
  value: unknown,
  key: string,
  errors: string[],
): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value.length === 0) {
    errors.push(`${key} must be a non-empty string`);
    return undefined;
  }
  return value;
}

function parseStringList(
  value: unknown,
  key: string,
  errors: string[],
): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    errors.push(`${key} must be a list of paths`);
    return undefined;
  }
  const items: string[] = [];
  value.forEach((item: unknown, index: number) => {
    if (typeof item !== "string" || item.length === 0) {
      errors.push(`${key}[${index}] must be a non-empty string`);
      return;
    }
    items.push(item);
  });
  return items;
}

async function readConfigFile(
  configPath: string,
  required: boolean,
): Promise<string | null> {
  try {
    return await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (
      !required &&
      error instanceof Error &&
      "code" in error &&
      error.code === "ENOENT"
    ) {
      return null;
    }
    throw error;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
