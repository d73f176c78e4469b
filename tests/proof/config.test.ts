import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  applyConfigOverrides,
  defaultProofConfig,
  loadProofConfig,
} from "../../src/proof/proof-config.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "merkle-audit-config-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("proof config", () => {
  it("falls back to the default layout without a config file", async () => {
    const config = await loadProofConfig({ repoRoot: tempDir });
    expect(config).toEqual({
      repoRoot: tempDir,
      contracts: [path.join(tempDir, "16_codex/contracts/sot/sot_contract.yaml")],
      outputPath: path.join(
        tempDir,
        "02_audit_logging/proof/proof_of_detection.json",
      ),
      leafOrder: "source",
      registryPath: path.join(
        tempDir,
        "23_compliance/registry/compliance_registry.json",
      ),
      evidenceDir: path.join(tempDir, "02_audit_logging/evidence"),
      reportsDir: path.join(tempDir, "02_audit_logging/reports"),
    });
  });

  it("reads merkle-audit.yaml relative to the repo root", async () => {
    await fs.writeFile(
      path.join(tempDir, "merkle-audit.yaml"),
      [
        "contracts:",
        "  - rules/gdpr.yaml",
        "  - rules/mica.yaml",
        "output: out/proof.json",
        "leaf_order: rule-id",
      ].join("\n"),
      "utf8",
    );

    const config = await loadProofConfig({ repoRoot: tempDir });
    expect(config.contracts).toEqual([
      path.join(tempDir, "rules/gdpr.yaml"),
      path.join(tempDir, "rules/mica.yaml"),
    ]);
    expect(config.outputPath).toBe(path.join(tempDir, "out/proof.json"));
    expect(config.leafOrder).toBe("rule-id");
    expect(config.evidenceDir).toBe(
      path.join(tempDir, "02_audit_logging/evidence"),
    );
  });

  it("collects every validation error", async () => {
    const configPath = path.join(tempDir, "custom.yaml");
    await fs.writeFile(
      configPath,
      ["contracts: nope", "leaf_order: random", "extra: 1"].join("\n"),
      "utf8",
    );

    await expect(
      loadProofConfig({ repoRoot: tempDir, configPath }),
    ).rejects.toThrow(
      `Invalid config ${configPath}: unknown key 'extra'; contracts must be a list of paths; leaf_order must be 'source' or 'rule-id'`,
    );
  });

  it("requires an explicitly named config file", async () => {
    await expect(
      loadProofConfig({
        repoRoot: tempDir,
        configPath: path.join(tempDir, "absent.yaml"),
      }),
    ).rejects.toThrow();
  });

  it("lets overrides win", () => {
    const config = applyConfigOverrides(defaultProofConfig(tempDir), {
      output: "elsewhere/proof.json",
      registry: "/abs/registry.json",
      contracts: [],
    });
    expect(config.outputPath).toBe(path.join(tempDir, "elsewhere/proof.json"));
    expect(config.registryPath).toBe("/abs/registry.json");
    expect(config.contracts).toEqual(defaultProofConfig(tempDir).contracts);
  });
});
