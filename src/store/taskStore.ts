import { all, get, run, type Db } from '../common/db.js'
import type { Task, TaskRow, TaskStatus } from '../common/types.js'

export type TaskFilter = {
  statuses?: readonly TaskStatus[]
  updatedBeforeMs?: number
  limit?: number
}

function toRow(task: Task): TaskRow {
  return {
    id: task.id,
    status: task.status,
    version: task.version,
    doc_json: JSON.stringify(task),
    created_at_ms: task.createdAtMs,
    updated_at_ms: task.updatedAtMs,
  }
}

function fromRow(row: TaskRow): Task {
  const doc = JSON.parse(row.doc_json) as Task
  // 列是权威值，文档里的冗余字段以列为准
  return { ...doc, id: row.id, status: row.status, version: row.version }
}

/**
 * 任务记录的持久化。每次写入 version + 1，
 * compareAndSet 只有在库里的 version 仍是调用方读到的那个时才会生效。
 */
export class TaskStore {
  constructor(private readonly db: Db) {}

  async insert(task: Task): Promise<void> {
    const row = toRow(task)
    await run(
      this.db,
      `INSERT INTO tasks (id, status, version, doc_json, created_at_ms, updated_at_ms) VALUES (?, ?, ?, ?, ?, ?)`,
      [row.id, row.status, row.version, row.doc_json, row.created_at_ms, row.updated_at_ms],
    )
  }

  async get(id: string): Promise<Task | null> {
    const row = await get<TaskRow>(this.db, `SELECT * FROM tasks WHERE id = ?`, [id])
    return row ? fromRow(row) : null
  }

  async list(filter: TaskFilter = {}): Promise<Task[]> {
    const where: string[] = []
    const params: unknown[] = []
    if (filter.statuses) {
      if (!filter.statuses.length) return []
      where.push(`status IN (${filter.statuses.map(() => '?').join(', ')})`)
      params.push(...filter.statuses)
    }
    if (filter.updatedBeforeMs !== undefined) {
      where.push(`updated_at_ms < ?`)
      params.push(filter.updatedBeforeMs)
    }
    let sql = `SELECT * FROM tasks`
    if (where.length) sql += ` WHERE ${where.join(' AND ')}`
    sql += ` ORDER BY created_at_ms DESC, id ASC`
    if (filter.limit !== undefined) {
      sql += ` LIMIT ?`
      params.push(filter.limit)
    }
    const rows = await all<TaskRow>(this.db, sql, params)
    return rows.map(fromRow)
  }

  /**
   * 以 next.version - 1 作为期望版本写入。
   * 返回 false 表示记录已被别人改过（或已删除），调用方需要重读。
   */
  async compareAndSet(next: Task): Promise<boolean> {
    const row = toRow(next)
    const changes = await run(
      this.db,
      `UPDATE tasks SET status = ?, version = ?, doc_json = ?, updated_at_ms = ? WHERE id = ? AND version = ?`,
      [row.status, row.version, row.doc_json, row.updated_at_ms, row.id, next.version - 1],
    )
    return changes === 1
  }

  async delete(id: string): Promise<boolean> {
    const changes = await run(this.db, `DELETE FROM tasks WHERE id = ?`, [id])
    return changes === 1
  }
}
