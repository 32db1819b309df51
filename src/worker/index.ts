import { CONFIG } from '../common/config.js'
import { errorMessage } from '../common/errors.js'
import { initDb, openDb } from '../common/db.js'
import { FileStore } from '../store/fileStore.js'
import { TaskStore } from '../store/taskStore.js'
import { expireTasks, sweepOrphans } from './cleanup.js'

/**
 * 维护进程：定期删除超过保留期的终态任务，并清理没有任务引用的孤儿文件。
 * 只删除数据，不改任务状态，可以和 API 进程同时运行。
 */
async function main() {
  const db = openDb()
  await initDb(db)
  const files = new FileStore(db, CONFIG.DATA_DIR)
  const tasks = new TaskStore(db)

  const tick = async () => {
    const expired = await expireTasks(tasks, files, { retentionHours: CONFIG.RETENTION_HOURS })
    const swept = await sweepOrphans(tasks, files, { minAgeMs: CONFIG.ORPHAN_GRACE_S * 1000 })
    console.log(`[worker] 维护完成：过期任务 ${expired} 个，孤儿文件 ${swept} 个`)
  }
  const safeTick = () => {
    tick().catch((e: unknown) => console.error('[worker] 维护失败:', errorMessage(e)))
  }

  setInterval(safeTick, CONFIG.SWEEP_INTERVAL_S * 1000)
  // 启动时先清理一次
  safeTick()

  console.log('[worker] started')
}

main().catch((e: unknown) => {
  console.error('[worker] 启动失败:', errorMessage(e))
  process.exit(1)
})
