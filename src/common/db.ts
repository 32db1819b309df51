import path from 'node:path'
import fs from 'node:fs'
import { Database, type RunResult } from 'sqlite3'
import { CONFIG } from './config.js'
import { AppError } from './errors.js'
import { ERROR_KIND } from './types.js'

export type Db = Database

function ensureDir(p: string) {
  if (!fs.existsSync(p)) fs.mkdirSync(p, { recursive: true })
}

/** filename 传 ':memory:' 时使用内存库（测试用） */
export function openDb(filename?: string): Db {
  if (filename) return new Database(filename)
  ensureDir(path.join(CONFIG.DATA_DIR, 'db'))
  const dbPath = path.join(CONFIG.DATA_DIR, 'db', 'app.sqlite3')
  return new Database(dbPath)
}

export function closeDb(db: Db): Promise<void> {
  return new Promise((resolve, reject) => {
    db.close((err: Error | null) => (err ? reject(storeError(err)) : resolve()))
  })
}

function storeError(err: Error): AppError {
  return new AppError(ERROR_KIND.STORE_UNAVAILABLE, `数据库不可用：${err.message}`)
}

export function initDb(db: Db): Promise<void> {
  const sql = `
CREATE TABLE IF NOT EXISTS files (
  id TEXT PRIMARY KEY,
  kind TEXT NOT NULL,
  original_name TEXT NOT NULL,
  mime_type TEXT NOT NULL,
  size_bytes INTEGER NOT NULL,
  abs_path TEXT NOT NULL,
  created_at_ms INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS tasks (
  id TEXT PRIMARY KEY,
  status TEXT NOT NULL,
  version INTEGER NOT NULL,
  doc_json TEXT NOT NULL,
  created_at_ms INTEGER NOT NULL,
  updated_at_ms INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
CREATE INDEX IF NOT EXISTS idx_tasks_created_at ON tasks(created_at_ms);
CREATE INDEX IF NOT EXISTS idx_files_created_at ON files(created_at_ms);
`
  return new Promise((resolve, reject) => {
    db.exec(sql, (err: Error | null) => (err ? reject(storeError(err)) : resolve()))
  })
}

/** 返回受影响的行数，CAS 更新靠它判断是否命中 */
export function run(db: Db, sql: string, params: unknown[] = []): Promise<number> {
  return new Promise((resolve, reject) => {
    db.run(sql, params, function (this: RunResult, err: Error | null) {
      if (err) reject(storeError(err))
      else resolve(this.changes)
    })
  })
}

export function get<T>(db: Db, sql: string, params: unknown[] = []): Promise<T | undefined> {
  return new Promise((resolve, reject) => {
    db.get(sql, params, (err: Error | null, row: unknown) => (err ? reject(storeError(err)) : resolve(row as T | undefined)))
  })
}

export function all<T>(db: Db, sql: string, params: unknown[] = []): Promise<T[]> {
  return new Promise((resolve, reject) => {
    db.all(sql, params, (err: Error | null, rows: unknown[]) => (err ? reject(storeError(err)) : resolve(rows as T[])))
  })
}
