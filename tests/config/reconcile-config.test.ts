import { mkdir, writeFile } from "node:fs/promises"
import path from "node:path"

import { afterEach, describe, expect, it } from "vitest"

import {
  buildDefaultReconcileConfig,
  loadReconcileConfig,
  parseReconcileConfig,
  resolveReconcileConfigPath,
  resolveRunSettings,
  type ResolvedReconcileConfig,
} from "../../src/config/reconcile-config.js"
import { ReconcileError } from "../../src/errors.js"
import { cleanupTempDirectories, createTempDirectory } from "../support/harness.js"

afterEach(async () => {
  await cleanupTempDirectories()
})

const resolvedAt = (
  configPath: string,
  overrides: Record<string, unknown> = {}
): ResolvedReconcileConfig => {
  return {
    config: parseReconcileConfig(JSON.stringify({ version: 1, ...overrides }), configPath),
    configPath,
    found: true,
  }
}

const captureConfigError = (source: string): ReconcileError => {
  try {
    parseReconcileConfig(source, "/etc/reconcile.json")
  } catch (error) {
    if (error instanceof ReconcileError) {
      return error
    }
    throw error
  }

  throw new Error("expected a ReconcileError")
}

describe("resolveReconcileConfigPath", () => {
  it("prefers the explicit path, then the environment, then the working directory", () => {
    expect(resolveReconcileConfigPath("conf/a.json", {}, "/srv/app")).toBe("/srv/app/conf/a.json")
    expect(
      resolveReconcileConfigPath(undefined, { SCHEMA_RECONCILE_CONFIG: "/etc/b.json" }, "/srv/app")
    ).toBe("/etc/b.json")
    expect(resolveReconcileConfigPath(undefined, {}, "/srv/app")).toBe(
      "/srv/app/schema-reconcile.json"
    )
  })
})

describe("parseReconcileConfig", () => {
  it("applies defaults", () => {
    expect(buildDefaultReconcileConfig()).toEqual({
      version: 1,
      backupSuffix: ".bak",
      lock: { enabled: true, staleMs: 60000 },
    })
  })

  it("rejects invalid JSON", () => {
    const error = captureConfigError("{ version: 1")

    expect(error.code).toBe("config_invalid")
    expect(error.message).toBe("Invalid JSON in reconcile config: /etc/reconcile.json")
  })

  it("rejects both profile sources at once", () => {
    const error = captureConfigError(
      JSON.stringify({ version: 1, profile: "placement-v1", profileFile: "custom.json" })
    )

    expect(error.message).toBe(
      "Invalid reconcile config in /etc/reconcile.json: " +
        "profileFile: set either profile or profileFile, not both"
    )
  })

  it("rejects a stale threshold below the lock library's minimum", () => {
    const error = captureConfigError(JSON.stringify({ version: 1, lock: { staleMs: 1000 } }))

    expect(error.message).toBe(
      "Invalid reconcile config in /etc/reconcile.json: lock.staleMs: lock.staleMs must be >= 5000"
    )
  })

  it("rejects unknown keys", () => {
    const error = captureConfigError(JSON.stringify({ version: 1, dropColumns: true }))

    expect(error.code).toBe("config_invalid")
    expect(error.message).toContain("dropColumns")
  })
})

describe("loadReconcileConfig", () => {
  it("falls back to defaults when the file is missing", async () => {
    // Arrange
    const directory = await createTempDirectory()
    const configPath = path.join(directory, "schema-reconcile.json")

    // Act
    const resolved = await loadReconcileConfig(configPath)

    // Assert
    expect(resolved).toEqual({
      config: buildDefaultReconcileConfig(),
      configPath,
      found: false,
    })
  })

  it("loads an existing file", async () => {
    // Arrange
    const directory = await createTempDirectory()
    const configPath = path.join(directory, "schema-reconcile.json")
    await writeFile(
      configPath,
      `${JSON.stringify({ version: 1, profile: "placement-v2", backupSuffix: ".orig" })}\n`,
      "utf8"
    )

    // Act
    const resolved = await loadReconcileConfig(configPath)

    // Assert
    expect(resolved.found).toBe(true)
    expect(resolved.config.profile).toBe("placement-v2")
    expect(resolved.config.backupSuffix).toBe(".orig")
  })

  it("propagates read errors other than a missing file", async () => {
    const directory = await createTempDirectory()
    const configPath = path.join(directory, "schema-reconcile.json")
    await mkdir(configPath)

    await expect(loadReconcileConfig(configPath)).rejects.toMatchObject({ code: "EISDIR" })
  })
})

describe("resolveRunSettings", () => {
  it("resolves config file paths against the config directory", () => {
    // Arrange
    const resolved = resolvedAt("/etc/portal/schema-reconcile.json", {
      databasePath: "data/portal.db",
      profileFile: "profiles/custom.json",
      lock: { enabled: false },
    })

    // Act
    const settings = resolveRunSettings(resolved, {}, {}, "/home/operator")

    // Assert
    expect(settings).toEqual({
      databasePath: "/etc/portal/data/portal.db",
      profile: { kind: "file", path: "/etc/portal/profiles/custom.json" },
      backupSuffix: ".bak",
      lock: { enabled: false, staleMs: 60000 },
    })
  })

  it("lets the environment override the config file", () => {
    const resolved = resolvedAt("/etc/portal/schema-reconcile.json", {
      databasePath: "data/portal.db",
      profile: "placement-v1",
    })

    const settings = resolveRunSettings(
      resolved,
      {},
      { SCHEMA_RECONCILE_DB: "local.db", SCHEMA_RECONCILE_PROFILE: "placement-v3" },
      "/home/operator"
    )

    expect(settings.databasePath).toBe("/home/operator/local.db")
    expect(settings.profile).toEqual({ kind: "builtin", id: "placement-v3" })
  })

  it("lets the command line override everything", () => {
    const resolved = resolvedAt("/etc/portal/schema-reconcile.json", { profile: "placement-v1" })

    const settings = resolveRunSettings(
      resolved,
      { databasePath: "cli.db", profileFile: "mine.json", lock: false },
      { SCHEMA_RECONCILE_DB: "env.db", SCHEMA_RECONCILE_PROFILE: "placement-v2" },
      "/home/operator"
    )

    expect(settings).toMatchObject({
      databasePath: "/home/operator/cli.db",
      profile: { kind: "file", path: "/home/operator/mine.json" },
      lock: { enabled: false },
    })
  })

  it("leaves the profile unselected and defaults the database file", () => {
    const settings = resolveRunSettings(
      resolvedAt("/srv/app/schema-reconcile.json"),
      {},
      {},
      "/srv/app"
    )

    expect(settings.profile).toBeNull()
    expect(settings.databasePath).toBe("/srv/app/database.db")
  })
})
