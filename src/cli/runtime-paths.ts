import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  applyConfigOverrides,
  loadProofConfig,
  type ConfigOverrides,
} from "../proof/proof-config.js";
import type { ProofConfig } from "../proof/types.js";
import type { RepoOptions } from "./types.js";

const PACKAGE_SEARCH_DEPTH = 4;

export function resolveRepoRoot(root?: string): string {
  return root ? path.resolve(root) : process.cwd();
}

/**
 * Load the repository config and apply command-line overrides. Paths given
 * on the command line are taken relative to the working directory.
 */
export async function loadCommandConfig(
  options: RepoOptions,
  overrides: ConfigOverrides = {},
): Promise<ProofConfig> {
  const config = await loadProofConfig({
    repoRoot: resolveRepoRoot(options.root),
    configPath: options.config,
  });
  return applyConfigOverrides(config, {
    ...overrides,
    contracts: overrides.contracts?.map((contract) => path.resolve(contract)),
    output: resolveOptional(overrides.output),
    registry: resolveOptional(overrides.registry),
    evidenceDir: resolveOptional(overrides.evidenceDir),
    reportsDir: resolveOptional(overrides.reportsDir),
  });
}

export async function loadVersion(): Promise<string> {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let level = 0; level < PACKAGE_SEARCH_DEPTH; level += 1) {
    dir = path.dirname(dir);
    const version = await readPackageVersion(path.join(dir, "package.json"));
    if (version) {
      return version;
    }
  }
  return "0.0.0";
}

function resolveOptional(input?: string): string | undefined {
  return input ? path.resolve(input) : undefined;
}

async function readPackageVersion(packagePath: string): Promise<string | null> {
  let raw: string;
  try {
    raw = await fs.readFile(packagePath, "utf8");
  } catch {
    return null;
  }
  const json: unknown = JSON.parse(raw);
  if (typeof json !== "object" || json === null || !("version" in json)) {
    return null;
  }
  return typeof json.version === "string" ? json.version : null;
}
