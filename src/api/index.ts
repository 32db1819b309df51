import { CONFIG } from '../common/config.js'
import { errorMessage } from '../common/errors.js'
import { initDb, openDb } from '../common/db.js'
import { TaskOrchestrator } from '../core/orchestrator.js'
import { FileStore } from '../store/fileStore.js'
import { TaskStore } from '../store/taskStore.js'
import { FfmpegVideoComposer } from '../worker/ffmpeg.js'
import { OpenRouterImageGenerator } from '../worker/generator.js'
import { loadStyleCatalog } from '../worker/styles.js'
import { createApp } from './app.js'

async function main() {
  const db = openDb()
  await initDb(db)

  const files = new FileStore(db, CONFIG.DATA_DIR)
  const tasks = new TaskStore(db)
  const orchestrator = new TaskOrchestrator({
    tasks,
    files,
    generator: new OpenRouterImageGenerator(CONFIG.OPENROUTER_API_KEY),
    composer: new FfmpegVideoComposer(),
    styleCatalog: loadStyleCatalog(),
  })

  // 上一个进程留下的任务：排队的继续执行，执行中的置为中断
  await orchestrator.recover()

  // 等待选择超时检查，和任务执行在同一进程，保证编排器是唯一的状态写入者
  const staleTimer = setInterval(() => {
    orchestrator.failStale().catch((e: unknown) => console.error('[api] 超时检查失败:', errorMessage(e)))
  }, 60 * 1000)

  const app = createApp(orchestrator, files)
  const server = app.listen(CONFIG.PORT, '0.0.0.0', () => {
    console.log(`[api] listening on 0.0.0.0:${CONFIG.PORT}`)
  })
  // 大文件下载需要更长的超时
  server.timeout = 120000

  const shutdown = (signal: string) => {
    console.log(`[api] 收到 ${signal}，停止接收请求`)
    clearInterval(staleTimer)
    server.close()
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

main().catch((e: unknown) => {
  console.error('[api] 启动失败:', errorMessage(e))
  process.exit(1)
})
