import { errorMessage } from '../common/errors.js'
import { isGenerated, TASK_STATUS, type Task } from '../common/types.js'
import type { FileStore } from '../store/fileStore.js'
import type { TaskStore } from '../store/taskStore.js'

export type DeleteOutcome = 'deleted' | 'protected' | 'missing'

export type DeletionReport = {
  taskId: string
  deleted: string[]
  protected: string[]
  missing: string[]
  failed: { fileId: string; message: string }[]
}

/** 任务对文件仓库的全部引用：原图、生成图、视频、所选音频 */
export function taskFileIds(task: Task): string[] {
  const ids = new Set<string>()
  if (task.originalImageId) ids.add(task.originalImageId)
  for (const img of task.images) {
    if (isGenerated(img)) ids.add(img.fileId)
  }
  if (task.videoId) ids.add(task.videoId)
  if (task.selection?.audioId) ids.add(task.selection.audioId)
  return [...ids]
}

export function collectReferences(tasks: readonly Task[], excludingTaskId?: string): Set<string> {
  const refs = new Set<string>()
  for (const t of tasks) {
    if (t.id === excludingTaskId) continue
    for (const id of taskFileIds(t)) refs.add(id)
  }
  return refs
}

/**
 * 扫描除 excludingTaskId 以外的所有任务，没有任何任务引用时才删除文件。
 * 扫描不加锁：活跃任务的引用只增不减，不会把仍在使用的文件误判为未引用。
 */
export async function deleteIfUnreferenced(
  tasks: TaskStore,
  files: FileStore,
  fileId: string,
  excludingTaskId: string,
): Promise<DeleteOutcome> {
  const refs = collectReferences(await tasks.list(), excludingTaskId)
  if (refs.has(fileId)) return 'protected'
  const removed = await files.remove(fileId)
  return removed ? 'deleted' : 'missing'
}

/**
 * 删除任务：逐个尝试删除它引用的文件（被其他任务引用的保留），最后删除任务记录。
 * 文件删除失败不影响记录删除，残留文件交给孤儿清理。
 */
export async function deleteTaskWithFiles(tasks: TaskStore, files: FileStore, task: Task): Promise<DeletionReport> {
  const report: DeletionReport = { taskId: task.id, deleted: [], protected: [], missing: [], failed: [] }

  for (const fileId of taskFileIds(task)) {
    try {
      const outcome = await deleteIfUnreferenced(tasks, files, fileId, task.id)
      report[outcome].push(fileId)
    } catch (e) {
      report.failed.push({ fileId, message: errorMessage(e) })
    }
  }

  await tasks.delete(task.id)
  console.log(
    `[cleanup] 任务 ${task.id} 已删除，删除文件 ${report.deleted.length} 个，保留 ${report.protected.length} 个，失败 ${report.failed.length} 个`,
  )
  if (report.failed.length) {
    console.warn('[cleanup] 删除失败的文件:', report.failed.map((f) => `${f.fileId}: ${f.message}`).join('; '))
  }
  return report
}

export type SweepOptions = {
  minAgeMs: number
  now?: number
}

/**
 * 删除没有任何任务引用的文件。比 minAgeMs 新的文件一律跳过，
 * 给「文件已上传但任务记录还没写入」留出窗口。
 */
export async function sweepOrphans(tasks: TaskStore, files: FileStore, opts: SweepOptions): Promise<number> {
  const now = opts.now ?? Date.now()
  const threshold = now - opts.minAgeMs
  // 先列文件再列任务，列任务时已写入的引用都能看到
  const rows = await files.list()
  const refs = collectReferences(await tasks.list())

  let count = 0
  for (const row of rows) {
    if (row.created_at_ms > threshold || refs.has(row.id)) continue
    if (await files.remove(row.id)) count += 1
  }
  if (count) console.log(`[cleanup] 清理孤儿文件 ${count} 个`)
  return count
}

export type ExpireOptions = {
  retentionHours: number
  now?: number
  limit?: number
}

/** 删除超过保留期的终态任务，走与手动删除相同的引用保护流程 */
export async function expireTasks(tasks: TaskStore, files: FileStore, opts: ExpireOptions): Promise<number> {
  const now = opts.now ?? Date.now()
  const expired = await tasks.list({
    statuses: [TASK_STATUS.COMPLETED, TASK_STATUS.FAILED, TASK_STATUS.CANCELLED],
    updatedBeforeMs: now - opts.retentionHours * 3600 * 1000,
    limit: opts.limit ?? 200,
  })
  for (const t of expired) {
    await deleteTaskWithFiles(tasks, files, t)
  }
  return expired.length
}
