import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from "sql.js"
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs"
import { dirname } from "path"

export const DEFAULT_DB_PATH = "data/medical_records.db"
export const IN_MEMORY = ":memory:"

/** Named (`@name` in SQL) or positional (`?`) parameters. */
export type SqlParams = Record<string, SqlValue> | SqlValue[]

export type SqlRow = Record<string, SqlValue>

export interface RunResult {
  changes: number
  lastInsertRowid: number
}

let engine: Promise<SqlJsStatic> | null = null

function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs()
  return engine
}

function bindParams(params: SqlParams): SqlParams {
  if (Array.isArray(params)) return params
  return Object.fromEntries(Object.entries(params).map(([key, value]) => [`@${key}`, value]))
}

/**
 * SQLite connection kept in process memory. File-backed databases are written
 * back to disk after every statement that can change them.
 */
export class SqliteDatabase {
  constructor(
    private readonly db: Database,
    readonly path: string,
  ) {}

  exec(sql: string): void {
    this.db.exec(sql)
    this.persist()
  }

  run(sql: string, params: SqlParams = []): RunResult {
    this.db.run(sql, bindParams(params))
    const changes = this.db.getRowsModified()
    const rowid = this.db.exec("SELECT last_insert_rowid()")[0]?.values[0]?.[0]
    this.persist()
    return { changes, lastInsertRowid: typeof rowid === "number" ? rowid : 0 }
  }

  get(sql: string, params: SqlParams = []): SqlRow | undefined {
    return this.all(sql, params)[0]
  }

  all(sql: string, params: SqlParams = []): SqlRow[] {
    const statement = this.db.prepare(sql)
    try {
      statement.bind(bindParams(params))
      const rows: SqlRow[] = []
      while (statement.step()) {
        rows.push(statement.getAsObject())
      }
      return rows
    } finally {
      statement.free()
    }
  }

  close(): void {
    this.db.close()
  }

  private persist(): void {
    if (this.path !== IN_MEMORY) {
      writeFileSync(this.path, this.db.export())
    }
  }
}

export function resolveDatabasePath(env: NodeJS.ProcessEnv = process.env): string {
  return env.VISIT_DB_PATH?.trim() || DEFAULT_DB_PATH
}

/**
 * Opens (creating if needed) the SQLite file holding patient records.
 * `:memory:` gives a private in-process database.
 */
export async function openDatabase(path: string = resolveDatabasePath()): Promise<SqliteDatabase> {
  const SQL = await loadEngine()
  if (path === IN_MEMORY) {
    return new SqliteDatabase(new SQL.Database(), path)
  }
  mkdirSync(dirname(path), { recursive: true })
  const contents = existsSync(path) ? readFileSync(path) : null
  return new SqliteDatabase(new SQL.Database(contents), path)
}
