import express, { type ErrorRequestHandler, type Request, type RequestHandler, type Response } from 'express'
import fs from 'node:fs'
import multer from 'multer'
import { z } from 'zod'

import { CONFIG } from '../common/config.js'
import { AppError, HTTP_STATUS_BY_KIND, errorMessage, invalidInput, notFound } from '../common/errors.js'
import { FILE_KIND, TASK_STATUS, type Task, type TaskStatus } from '../common/types.js'
import type { TaskOrchestrator } from '../core/orchestrator.js'
import type { FileStore } from '../store/fileStore.js'
import { TRANSITION_ID_PATTERN } from '../worker/composition.js'

function ok(res: Response, data: unknown): void {
  res.json({ code: 0, msg: 'ok', data })
}

/** express 4 不会接住 async handler 的 rejection，这里转给错误中间件 */
function route(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next)
  }
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw invalidInput(`参数不合法: ${issue.path.join('.') || 'body'} ${issue.message}`)
  }
  return parsed.data
}

const TransitionId = z.string().regex(TRANSITION_ID_PATTERN, '只能包含小写字母、数字和下划线')
const TransitionSchema = z.union([TransitionId, z.array(TransitionId).min(1).max(16)])

const SelectionSchema = z.object({
  imageIds: z.array(z.string().min(1)).min(1),
  transition: TransitionSchema.optional(),
  audioId: z.string().min(1).nullable().optional(),
  audioPolicy: z.enum(['silence', 'loop']).optional(),
  totalDurationS: z.number().positive().max(3600).nullable().optional(),
})

const CreateTaskSchema = z.object({
  originalImageId: z.string().min(1),
  styleCount: z.number().int().min(1).max(CONFIG.MAX_STYLE_COUNT),
  styles: z.array(z.string().min(1)).max(CONFIG.MAX_STYLE_COUNT).optional(),
  width: z.number().int().min(16).max(3840).optional(),
  height: z.number().int().min(16).max(2160).optional(),
  fps: z.number().int().min(1).max(60).optional(),
  slideSeconds: z.number().positive().max(60).optional(),
  transitionSeconds: z.number().min(0).max(10).optional(),
  transition: TransitionSchema.optional(),
  concurrency: z.number().int().min(1).max(8).optional(),
  includeOriginal: z.boolean().optional(),
  autoSelect: z.boolean().optional(),
})

const RegenerateSchema = z.object({
  selection: SelectionSchema.optional(),
  slideSeconds: z.number().positive().max(60).optional(),
  transitionSeconds: z.number().min(0).max(10).optional(),
  transition: TransitionSchema.optional(),
  includeOriginal: z.boolean().optional(),
})

const STATUSES = Object.values(TASK_STATUS)

function isTaskStatus(v: string): v is TaskStatus {
  return STATUSES.some((s) => s === v)
}

const ListQuerySchema = z.object({
  status: z
    .string()
    .optional()
    .transform((v) => (v ? v.split(',').map((s) => s.trim()) : undefined))
    .refine((v) => !v || v.every(isTaskStatus), { message: '未知的任务状态' }),
  limit: z.coerce.number().int().min(1).max(200).optional(),
})

const UPLOAD_MIME = /^(image\/(jpeg|png|webp|gif|bmp)|audio\/(mpeg|wav|x-wav|aac|ogg|mp4))$/

function toTaskView(task: Task) {
  const result =
    task.status === TASK_STATUS.COMPLETED && task.videoId
      ? { videoId: task.videoId, downloadUrl: `/v1/files/${task.videoId}` }
      : null
  return { ...task, result }
}

/**
 * HTTP 入口。所有后台阶段都在当前进程的编排器里运行，路由只负责校验和转发。
 */
export function createApp(orchestrator: TaskOrchestrator, fileStore: FileStore): express.Express {
  const app = express()

  // 请求日志中间件
  app.use((req, res, next) => {
    const start = Date.now()
    const timestamp = new Date().toISOString()
    res.on('finish', () => {
      const duration = Date.now() - start
      const logMsg = `[${timestamp}] ${req.method} ${req.path} - ${res.statusCode} (${duration}ms)`
      if (res.statusCode >= 400) {
        console.error(logMsg)
      } else {
        console.log(logMsg)
      }
    })
    next()
  })

  app.use(express.json({ limit: '2mb' }))

  app.get('/healthz', (_req, res) => {
    res.json({ ok: true })
  })

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: CONFIG.MAX_UPLOAD_MB * 1024 * 1024,
    },
  })

  app.post(
    '/v1/upload',
    upload.single('file'),
    route(async (req, res) => {
      const f = req.file
      if (!f) throw invalidInput('缺少文件')
      if (!UPLOAD_MIME.test(f.mimetype)) throw invalidInput(`不支持的文件类型: ${f.mimetype}`)

      const fileId = await fileStore.put(f.buffer, FILE_KIND.UPLOAD, f.mimetype, { originalName: f.originalname })
      ok(res, { fileId, size: f.size, mimeType: f.mimetype })
    }),
  )

  app.post(
    '/v1/tasks',
    route(async (req, res) => {
      const input = parseBody(CreateTaskSchema, req.body)
      const task = await orchestrator.createTask(input)
      ok(res, { taskId: task.id, status: task.status, styles: task.config.styles })
    }),
  )

  app.get(
    '/v1/tasks',
    route(async (req, res) => {
      const query = parseBody(ListQuerySchema, req.query)
      const statuses = query.status?.filter(isTaskStatus)
      const tasks = await orchestrator.list({ statuses, limit: query.limit })
      ok(
        res,
        tasks.map((t) => ({ id: t.id, status: t.status, progress: t.progress, createdAtMs: t.createdAtMs })),
      )
    }),
  )

  app.get(
    '/v1/tasks/:taskId',
    route(async (req, res) => {
      const task = await orchestrator.get(req.params.taskId)
      ok(res, toTaskView(task))
    }),
  )

  app.post(
    '/v1/tasks/:taskId/selection',
    route(async (req, res) => {
      const selection = parseBody(SelectionSchema, req.body)
      const task = await orchestrator.submitSelection(req.params.taskId, selection)
      ok(res, { taskId: task.id, status: task.status })
    }),
  )

  app.post(
    '/v1/tasks/:taskId/cancel',
    route(async (req, res) => {
      const task = await orchestrator.cancel(req.params.taskId)
      ok(res, { taskId: task.id, status: task.status })
    }),
  )

  app.post(
    '/v1/tasks/:taskId/regenerate',
    route(async (req, res) => {
      const { selection, ...overrides } = parseBody(RegenerateSchema, req.body ?? {})
      const task = await orchestrator.regenerate(req.params.taskId, selection, overrides)
      ok(res, { taskId: task.id, status: task.status, sourceTaskId: task.sourceTaskId })
    }),
  )

  app.delete(
    '/v1/tasks/:taskId',
    route(async (req, res) => {
      const report = await orchestrator.deleteTask(req.params.taskId)
      ok(res, report)
    }),
  )

  app.post(
    '/v1/maintenance/sweep',
    route(async (_req, res) => {
      const removed = await orchestrator.sweepOrphans()
      ok(res, { removed })
    }),
  )

  app.get(
    '/v1/files/:fileId',
    route(async (req, res) => {
      const file = await fileStore.stat(req.params.fileId)
      if (!file || !fs.existsSync(file.abs_path)) throw notFound('文件不存在')

      res.setHeader('Content-Type', file.mime_type)
      res.setHeader('Content-Length', file.size_bytes)
      res.setHeader('Content-Disposition', `inline; filename="${encodeURIComponent(file.original_name)}"`)
      res.setHeader('Cache-Control', 'public, max-age=3600')

      // 流式传输，避免大文件占用过多内存
      const fileStream = fs.createReadStream(file.abs_path)
      fileStream.on('error', (err) => {
        console.error('[file download error]', err)
        if (!res.headersSent) {
          res.status(500).json({ code: 500, msg: '文件读取失败' })
        } else {
          res.end()
        }
      })
      req.on('close', () => {
        if (!fileStream.destroyed) fileStream.destroy()
      })
      fileStream.pipe(res)
    }),
  )

  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (err instanceof AppError) {
      const status = HTTP_STATUS_BY_KIND[err.kind] ?? 500
      res.status(status).json({ code: status, msg: err.message, data: { kind: err.kind } })
      return
    }
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400
      res.status(status).json({ code: status, msg: `上传失败: ${err.message}` })
      return
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ code: 400, msg: '请求体不是合法的 JSON' })
      return
    }
    console.error('[api] 未处理的错误:', errorMessage(err))
    res.status(500).json({ code: 500, msg: '服务器内部错误' })
  }
  app.use(onError)

  return app
}
