import path from "node:path"
import { writeFile } from "node:fs/promises"

import { afterEach, describe, expect, it } from "vitest"

import { ReconcileError } from "../../src/errors.js"
import {
  findTable,
  getBuiltInProfile,
  loadBuiltInProfiles,
  loadProfileFile,
  parseProfile,
  resolveProfileDirectory,
} from "../../src/schema/profiles.js"
import { cleanupTempDirectories, createTempDirectory } from "../support/harness.js"

afterEach(async () => {
  await cleanupTempDirectories()
})

const captureError = (action: () => unknown): ReconcileError => {
  try {
    action()
  } catch (error) {
    if (error instanceof ReconcileError) {
      return error
    }
    throw error
  }

  throw new Error("expected a ReconcileError")
}

describe("parseProfile", () => {
  it("applies column defaults and freezes the result", () => {
    // Act
    const profile = parseProfile({
      id: "minimal",
      version: 2,
      tables: [{ name: "jobs", columns: [{ name: "title", sqlType: "TEXT" }] }],
    })

    // Assert
    expect(profile.description).toBe("")
    expect(profile.tables[0]?.columns[0]).toEqual({
      name: "title",
      sqlType: "TEXT",
      nullable: true,
      uniqueConstraint: false,
    })
    expect(Object.isFrozen(profile.tables)).toBe(true)
    expect(Object.isFrozen(profile.tables[0]?.columns[0])).toBe(true)
  })

  it("fills in implicit foreign key targets with the primary key", () => {
    // Act
    const profile = parseProfile({
      id: "keys",
      version: 1,
      tables: [
        { name: "jobs", columns: [{ name: "title", sqlType: "TEXT" }] },
        {
          name: "applications",
          columns: [{ name: "job_id", sqlType: "INTEGER", foreignKey: { table: "jobs" } }],
        },
      ],
    })

    // Assert
    expect(findTable(profile, "applications")?.columns[0]?.foreignKey).toEqual({
      table: "jobs",
      column: "id",
    })
  })

  it("rejects duplicate column names regardless of case", () => {
    // Act
    const error = captureError(() =>
      parseProfile({
        id: "dupes",
        version: 1,
        tables: [
          {
            name: "users",
            columns: [
              { name: "email", sqlType: "TEXT" },
              { name: "Email", sqlType: "TEXT" },
            ],
          },
        ],
      })
    )

    // Assert
    expect(error.code).toBe("profile_invalid")
    expect(error.message).toBe(
      'Invalid schema profile in inline profile: tables.users: duplicate column name "Email"'
    )
  })

  it("rejects duplicate table names", () => {
    const error = captureError(() =>
      parseProfile({
        id: "dupes",
        version: 1,
        tables: [
          { name: "jobs", columns: [] },
          { name: "JOBS", columns: [] },
        ],
      })
    )

    expect(error.code).toBe("profile_invalid")
    expect(error.message).toContain('tables: duplicate table name "JOBS"')
  })

  it("rejects foreign keys to tables the profile does not declare", () => {
    const error = captureError(() =>
      parseProfile({
        id: "dangling",
        version: 1,
        tables: [
          {
            name: "jobs",
            columns: [{ name: "owner_id", sqlType: "INTEGER", foreignKey: { table: "owners" } }],
          },
        ],
      })
    )

    expect(error.message).toContain(
      'tables.jobs.owner_id: foreign key targets undeclared table "owners"'
    )
  })

  it("rejects an id column that would clash with the surrogate key", () => {
    const error = captureError(() =>
      parseProfile({
        id: "clash",
        version: 1,
        tables: [{ name: "jobs", columns: [{ name: "id", sqlType: "INTEGER" }] }],
      })
    )

    expect(error.message).toContain('tables.jobs: column "id" clashes with the surrogate key')
  })

  it("rejects a primary key that is not a declared column", () => {
    const error = captureError(() =>
      parseProfile({
        id: "missing-key",
        version: 1,
        tables: [
          { name: "codes", primaryKey: "code", columns: [{ name: "label", sqlType: "TEXT" }] },
        ],
      })
    )

    expect(error.message).toContain('tables.codes: primary key "code" is not a declared column')
  })

  it("rejects unsupported column types through schema validation", () => {
    const error = captureError(() =>
      parseProfile({
        id: "blob",
        version: 1,
        tables: [{ name: "files", columns: [{ name: "payload", sqlType: "BLOB" }] }],
      })
    )

    expect(error.code).toBe("profile_invalid")
    expect(error.message).toContain("tables.0.columns.0.sqlType")
  })

  it("rejects identifiers that are not plain SQL names", () => {
    const error = captureError(() =>
      parseProfile({
        id: "quoted",
        version: 1,
        tables: [{ name: "jobs; DROP TABLE users", columns: [] }],
      })
    )

    expect(error.code).toBe("profile_invalid")
    expect(error.message).toContain("tables.0.name")
  })
})

describe("built-in profiles", () => {
  it("finds the bundled profile directory", () => {
    expect(path.basename(resolveProfileDirectory())).toBe("profiles")
  })

  it("loads every generation in file order", () => {
    // Act
    const profiles = loadBuiltInProfiles()

    // Assert
    expect(profiles.map((profile) => [profile.id, profile.version])).toEqual([
      ["placement-v1", 1],
      ["placement-v2", 2],
      ["placement-v3", 3],
    ])
  })

  it("keeps the columns the portal handlers rely on in the consolidated generation", () => {
    // Arrange
    const profile = getBuiltInProfile("placement-v3")
    const columnsOf = (tableName: string): string[] =>
      findTable(profile, tableName)?.columns.map((column) => column.name) ?? []

    // Assert
    expect(columnsOf("users")).toEqual(
      expect.arrayContaining([
        "username",
        "email",
        "password",
        "role",
        "resume",
        "city",
        "job_preference",
      ])
    )
    expect(columnsOf("jobs")).toEqual(
      expect.arrayContaining([
        "title",
        "company",
        "description",
        "location",
        "job_type",
        "salary",
        "recruiter_id",
        "posted_by",
        "post_date",
        "interview_date",
        "interview_time",
        "interview_place",
        "application_date",
        "job_status",
      ])
    )
    expect(columnsOf("applications")).toEqual(
      expect.arrayContaining([
        "job_id",
        "student_id",
        "student_name",
        "application_date",
        "resume",
        "email",
        "city",
        "company",
        "job_title",
      ])
    )
  })

  it("keeps the generations' disagreement on salary explicit", () => {
    const salaryType = (profileId: string): string | undefined =>
      findTable(getBuiltInProfile(profileId), "jobs")?.columns.find(
        (column) => column.name === "salary"
      )?.sqlType

    expect(salaryType("placement-v1")).toBe("INTEGER")
    expect(salaryType("placement-v3")).toBe("TEXT")
  })

  it("lists available profiles when the requested one is unknown", () => {
    const error = captureError(() => getBuiltInProfile("placement-v9"))

    expect(error.code).toBe("profile_not_found")
    expect(error.message).toBe(
      "Unknown schema profile: placement-v9. Available profiles: placement-v1, placement-v2, placement-v3"
    )
  })
})

describe("loadProfileFile", () => {
  it("loads an operator supplied profile", async () => {
    // Arrange
    const directory = await createTempDirectory()
    const filePath = path.join(directory, "custom.json")
    await writeFile(
      filePath,
      JSON.stringify({
        id: "custom",
        version: 4,
        description: "local",
        tables: [{ name: "notes", columns: [{ name: "body", sqlType: "TEXT" }] }],
      }),
      "utf8"
    )

    // Act
    const profile = loadProfileFile(filePath)

    // Assert
    expect(profile.id).toBe("custom")
    expect(profile.tables.map((table) => table.name)).toEqual(["notes"])
  })

  it("reports invalid JSON with the file path", async () => {
    const directory = await createTempDirectory()
    const filePath = path.join(directory, "broken.json")
    await writeFile(filePath, "{ not json", "utf8")

    const error = captureError(() => loadProfileFile(filePath))

    expect(error.code).toBe("profile_invalid")
    expect(error.message).toBe(`Invalid JSON in schema profile: ${filePath}`)
  })

  it("reports a missing file as not found", async () => {
    const directory = await createTempDirectory()
    const filePath = path.join(directory, "absent.json")

    const error = captureError(() => loadProfileFile(filePath))

    expect(error.code).toBe("profile_not_found")
  })
})
