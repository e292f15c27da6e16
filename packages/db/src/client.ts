import Database from "better-sqlite3"
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3"
import { Context, Effect, Layer } from "effect"
import { readdirSync, readFileSync } from "node:fs"
import { fileURLToPath } from "node:url"
import { StorageError, appConfig } from "@pawtrail/core"
import * as schema from "./schema.js"

export type PawtrailDatabase = BetterSQLite3Database<typeof schema>

export interface SqliteClient {
  readonly db: PawtrailDatabase
  readonly sqlite: Database.Database
}

export const SqliteClient = Context.GenericTag<SqliteClient>("@pawtrail/SqliteClient")

const MIGRATIONS_DIR = fileURLToPath(new URL("../migrations/", import.meta.url))

/**
 * Runs every migration file in name order. Migrations only use
 * `IF NOT EXISTS`, so running them against an existing database is a no-op.
 */
export const migrate = (sqlite: Database.Database): Effect.Effect<ReadonlyArray<string>, StorageError> =>
  Effect.try({
    try: () => {
      const files = readdirSync(MIGRATIONS_DIR)
        .filter((file) => file.endsWith(".sql"))
        .sort()
      for (const file of files) {
        sqlite.exec(readFileSync(`${MIGRATIONS_DIR}${file}`, "utf8"))
      }
      return files
    },
    catch: (cause) => new StorageError({ operation: "write", cause, message: `Migration failed: ${String(cause)}` }),
  })

const open = (filename: string) =>
  Effect.try({
    try: () => {
      const sqlite = new Database(filename)
      if (filename !== ":memory:") sqlite.pragma("journal_mode = WAL")
      return sqlite
    },
    catch: (cause) =>
      new StorageError({ operation: "read", cause, message: `Cannot open database ${filename}: ${String(cause)}` }),
  })

export const makeSqliteClient = (filename: string): Layer.Layer<SqliteClient, StorageError> =>
  Layer.scoped(
    SqliteClient,
    Effect.gen(function* () {
      const sqlite = yield* Effect.acquireRelease(open(filename), (connection) =>
        Effect.sync(() => connection.close())
      )
      const applied = yield* migrate(sqlite)
      yield* Effect.logDebug(`Applied ${applied.length} migration file(s) to ${filename}`)
      return { sqlite, db: drizzle(sqlite, { schema }) }
    })
  )

export const SqliteClientLive = Layer.unwrapEffect(
  appConfig.pipe(Effect.map((config) => makeSqliteClient(config.dbPath)))
)
