import fs from "node:fs"
import path from "node:path"
import Database from "better-sqlite3"
import { ConfigurationError, describeError } from "../errors.js"

export type SqliteDatabase = Database.Database

/** Opens (creating when absent) the SQLite file the SQL tools run against. */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ":memory:") {
    const resolved = path.resolve(dbPath)
    if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
      throw new ConfigurationError(`Database path is a directory: ${dbPath}`)
    }
    if (!fs.existsSync(path.dirname(resolved))) {
      throw new ConfigurationError(`Database directory does not exist: ${path.dirname(resolved)}`)
    }
  }

  try {
    return new Database(dbPath)
  } catch (e) {
    throw new ConfigurationError(`Cannot open database ${dbPath}: ${describeError(e)}`)
  }
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

export function listTableNames(db: SqliteDatabase): string[] {
  return db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    )
    .all()
    .map((row) => row.name)
}
