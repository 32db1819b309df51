import { nanoid } from 'nanoid'

import { CONFIG } from '../common/config.js'
import { AppError, errorMessage, invalidInput, invalidState, notFound } from '../common/errors.js'
import {
  ERROR_KIND,
  isGenerated,
  TASK_STATUS,
  type AudioPolicy,
  type ErrorKind,
  type GeneratedImage,
  type Selection,
  type Task,
  type TaskConfig,
  type TaskStatus,
  type TransitionSpec,
} from '../common/types.js'
import type { FileStore } from '../store/fileStore.js'
import type { TaskFilter, TaskStore } from '../store/taskStore.js'
import { deleteTaskWithFiles, sweepOrphans, type DeletionReport } from '../worker/cleanup.js'
import {
  CompositionError,
  normalizeTransitions,
  planComposition,
  runComposition,
  type CompositionPlan,
  type VideoComposer,
} from '../worker/composition.js'
import type { ImageGenerator } from '../worker/generator.js'
import { GENERATION_WEIGHT, runGeneration, type GenerationResult } from '../worker/scheduler.js'
import { selectStyles } from '../worker/styles.js'
import { isTerminal, type NextStatus } from './stateMachine.js'

export type OrchestratorSettings = {
  defaultConcurrency: number
  generationTimeoutMs: number
  composeTimeoutMs: number
  selectionTimeoutMs: number
  retryDelayMs: number
  maxRetries: number
  maxStyleCount: number
}

export type OrchestratorDeps = {
  tasks: TaskStore
  files: FileStore
  generator: ImageGenerator
  composer: VideoComposer
  styleCatalog: readonly string[]
  settings?: Partial<OrchestratorSettings>
  now?: () => number
}

export type CreateTaskInput = {
  originalImageId: string
  styleCount: number
  styles?: string[]
  width?: number
  height?: number
  fps?: number
  slideSeconds?: number
  transitionSeconds?: number
  transition?: TransitionSpec
  concurrency?: number
  includeOriginal?: boolean
  autoSelect?: boolean
}

export type SelectionInput = {
  imageIds: string[]
  transition?: TransitionSpec
  audioId?: string | null
  audioPolicy?: AudioPolicy
  totalDurationS?: number | null
}

type TaskPatch = Partial<Pick<Task, 'images' | 'selection' | 'videoId' | 'error' | 'warning' | 'progress'>>

/** 在任务写入之前拦下以后一定无法合成的时长和转场配置 */
function validateTiming(config: TaskConfig): void {
  if (!(config.slideSeconds > 0)) throw invalidInput('单张时长必须为正数')
  if (!(config.transitionSeconds >= 0) || config.transitionSeconds >= config.slideSeconds) {
    throw invalidInput(`转场时长 ${config.transitionSeconds}s 必须小于单张时长 ${config.slideSeconds}s`)
  }
  try {
    normalizeTransitions(config.transition)
  } catch (e) {
    if (e instanceof CompositionError) throw invalidInput(e.message)
    throw e
  }
}

const DEFAULT_SETTINGS: OrchestratorSettings = {
  defaultConcurrency: CONFIG.GENERATION_CONCURRENCY,
  generationTimeoutMs: CONFIG.GENERATION_TIMEOUT_S * 1000,
  composeTimeoutMs: CONFIG.COMPOSE_TIMEOUT_S * 1000,
  selectionTimeoutMs: CONFIG.SELECTION_TIMEOUT_S * 1000,
  retryDelayMs: CONFIG.GENERATION_RETRY_DELAY_MS,
  maxRetries: CONFIG.GENERATION_MAX_RETRIES,
  maxStyleCount: CONFIG.MAX_STYLE_COUNT,
}

/**
 * 把并发回调里的进度回报串成一条写入链，依次落库。
 * 第一个写入错误会在 flush 时抛出。
 */
class ProgressWriter {
  private chain: Promise<void> = Promise.resolve()
  private failure: { error: unknown } | null = null

  constructor(private readonly write: (progress: number) => Promise<void>) {}

  report(progress: number): void {
    this.chain = this.chain
      .then(() => this.write(progress))
      .catch((error: unknown) => {
        if (!this.failure) this.failure = { error }
      })
  }

  async flush(): Promise<void> {
    await this.chain
    if (this.failure) throw this.failure.error
  }
}

/**
 * 任务状态机的唯一写入者。
 * 状态迁移用 (status, version) 做 CAS，两个完成信号不可能同时推进同一个任务；
 * 进度写入遇到版本冲突会重读重试，并且只取更大的值。
 */
export class TaskOrchestrator {
  private readonly tasks: TaskStore
  private readonly files: FileStore
  private readonly generator: ImageGenerator
  private readonly composer: VideoComposer
  private readonly styleCatalog: readonly string[]
  private readonly settings: OrchestratorSettings
  private readonly now: () => number
  private readonly running = new Map<string, AbortController>()
  private readonly inflight = new Set<Promise<void>>()

  constructor(deps: OrchestratorDeps) {
    this.tasks = deps.tasks
    this.files = deps.files
    this.generator = deps.generator
    this.composer = deps.composer
    this.styleCatalog = deps.styleCatalog
    this.settings = { ...DEFAULT_SETTINGS, ...deps.settings }
    this.now = deps.now ?? Date.now
  }

  async get(id: string): Promise<Task> {
    const task = await this.tasks.get(id)
    if (!task) throw notFound('任务不存在')
    return task
  }

  list(filter: TaskFilter = {}): Promise<Task[]> {
    return this.tasks.list({ ...filter, limit: filter.limit ?? 50 })
  }

  /** 等待所有后台阶段结束（测试和停机时使用） */
  async idle(): Promise<void> {
    while (this.inflight.size) {
      await Promise.all([...this.inflight])
    }
  }

  private launch(taskId: string, job: () => Promise<void>): void {
    const p = job()
      .catch((e: unknown) => {
        console.error(`[orchestrator] 任务 ${taskId} 后台执行出错:`, errorMessage(e))
      })
      .finally(() => {
        this.inflight.delete(p)
      })
    this.inflight.add(p)
  }

  async createTask(input: CreateTaskInput, opts: { start?: boolean } = {}): Promise<Task> {
    if (!Number.isInteger(input.styleCount) || input.styleCount < 1 || input.styleCount > this.settings.maxStyleCount) {
      throw invalidInput(`风格数量必须在 1 到 ${this.settings.maxStyleCount} 之间`)
    }
    if (!(await this.files.exists(input.originalImageId))) {
      throw notFound('找不到原始图片')
    }

    const styles = selectStyles(input.styles ?? [], input.styleCount, this.styleCatalog)
    if (!styles.length) throw invalidInput('没有可用的风格')

    const config: TaskConfig = {
      styleCount: input.styleCount,
      styles,
      width: input.width ?? CONFIG.DEFAULT_WIDTH,
      height: input.height ?? CONFIG.DEFAULT_HEIGHT,
      fps: input.fps ?? CONFIG.DEFAULT_FPS,
      slideSeconds: input.slideSeconds ?? CONFIG.DEFAULT_SLIDE_SECONDS,
      transitionSeconds: input.transitionSeconds ?? CONFIG.DEFAULT_TRANSITION_SECONDS,
      transition: input.transition ?? CONFIG.DEFAULT_TRANSITION,
      concurrency: Math.max(1, input.concurrency ?? this.settings.defaultConcurrency),
      includeOriginal: input.includeOriginal ?? false,
      autoSelect: input.autoSelect ?? false,
    }
    validateTiming(config)

    const now = this.now()
    const task: Task = {
      id: nanoid(),
      status: TASK_STATUS.QUEUED,
      progress: 0,
      version: 1,
      config,
      originalImageId: input.originalImageId,
      images: [],
      selection: null,
      videoId: null,
      sourceTaskId: null,
      error: null,
      warning: null,
      createdAtMs: now,
      updatedAtMs: now,
      completedAtMs: null,
    }
    await this.tasks.insert(task)
    console.log(`[orchestrator] 创建任务 ${task.id}，风格: ${styles.join(', ')}`)

    if (opts.start ?? true) this.launch(task.id, () => this.admit(task.id))
    return task
  }

  /**
   * CAS 状态迁移。当前状态不是 from 时返回 null（已被其他信号推进或已删除）。
   * 版本冲突（通常是并发的进度写入）时重读重试。
   */
  private async transition<S extends TaskStatus>(
    id: string,
    from: S,
    to: NextStatus<S>,
    patch: TaskPatch = {},
  ): Promise<Task | null> {
    for (;;) {
      const current = await this.tasks.get(id)
      if (!current || current.status !== from) return null
      const now = this.now()
      const next: Task = {
        ...current,
        ...patch,
        status: to,
        progress: Math.max(current.progress, patch.progress ?? 0),
        version: current.version + 1,
        updatedAtMs: now,
        completedAtMs: current.completedAtMs ?? (isTerminal(to) ? now : null),
      }
      if (await this.tasks.compareAndSet(next)) {
        console.log(`[orchestrator] 任务 ${id}: ${from} -> ${to}`)
        return next
      }
    }
  }

  private async fail(
    id: string,
    from: 'queued' | 'generating' | 'awaiting_selection' | 'composing',
    kind: ErrorKind,
    message: string,
    patch: TaskPatch = {},
  ): Promise<Task | null> {
    console.warn(`[orchestrator] 任务 ${id} 失败 (${kind}): ${message}`)
    return this.transition(id, from, TASK_STATUS.FAILED, { ...patch, error: { kind, message } })
  }

  /** 进度只增不减；终态任务不再写进度 */
  private async bumpProgress(id: string, progress: number): Promise<void> {
    for (;;) {
      const current = await this.tasks.get(id)
      if (!current || isTerminal(current.status) || progress <= current.progress) return
      const next: Task = { ...current, progress, version: current.version + 1, updatedAtMs: this.now() }
      if (await this.tasks.compareAndSet(next)) return
    }
  }

  /** queued -> generating，执行生成阶段 */
  async admit(id: string): Promise<void> {
    const task = await this.transition(id, TASK_STATUS.QUEUED, TASK_STATUS.GENERATING)
    if (!task) return

    // 迁移成功后立即登记，读原图期间到来的取消也能中止生成
    const controller = new AbortController()
    this.running.set(id, controller)
    const progress = new ProgressWriter((p) => this.bumpProgress(id, p))
    let result: GenerationResult
    try {
      const source = await this.files.get(task.originalImageId)
      const meta = await this.files.stat(task.originalImageId)
      if (!source || !meta) {
        await this.fail(id, TASK_STATUS.GENERATING, ERROR_KIND.NOT_FOUND, '找不到原始图片')
        return
      }
      result = await runGeneration({
        image: source,
        contentType: meta.mime_type,
        styles: task.config.styles,
        concurrency: task.config.concurrency,
        timeoutMs: this.settings.generationTimeoutMs,
        retryDelayMs: this.settings.retryDelayMs,
        maxRetries: this.settings.maxRetries,
        generator: this.generator,
        fileStore: this.files,
        signal: controller.signal,
        onProgress: (p) => progress.report(p.percent),
      })
    } finally {
      this.running.delete(id)
    }
    await progress.flush()

    if (result.cancelled) {
      console.log(`[orchestrator] 任务 ${id} 已取消，生成结果不再挂载`)
      return
    }

    if (result.succeeded === 0) {
      const kind = result.timedOut ? ERROR_KIND.TIMEOUT : ERROR_KIND.GENERATION_EXHAUSTED
      await this.fail(id, TASK_STATUS.GENERATING, kind, `${result.images.length} 个风格全部生成失败`, {
        images: result.images,
      })
      return
    }

    const ready = await this.transition(id, TASK_STATUS.GENERATING, TASK_STATUS.AWAITING_SELECTION, {
      images: result.images,
      progress: GENERATION_WEIGHT,
      warning: result.failed
        ? {
            kind: 'partial_generation',
            message: `${result.failed}/${result.images.length} 个风格生成失败`,
            failed: result.failed,
          }
        : null,
    })
    if (!ready) {
      console.warn(`[orchestrator] 任务 ${id} 状态已变化，生成结果未挂载`)
      return
    }

    if (ready.config.autoSelect) {
      const imageIds = ready.images.filter(isGenerated).map((img) => img.fileId)
      try {
        await this.submitSelection(id, { imageIds })
      } catch (e) {
        const kind = e instanceof AppError ? e.kind : ERROR_KIND.INVALID_INPUT
        await this.fail(id, TASK_STATUS.AWAITING_SELECTION, kind, `自动选择失败: ${errorMessage(e)}`)
      }
    }
  }

  private buildPlan(task: Task, input: SelectionInput): { selection: Selection; plan: CompositionPlan } {
    const generated = new Set(task.images.filter(isGenerated).map((img) => img.fileId))
    if (!input.imageIds.length) throw invalidInput('至少需要选择一张图片')
    for (const fileId of input.imageIds) {
      if (!generated.has(fileId)) throw invalidInput(`图片 ${fileId} 不属于该任务的生成结果`)
    }
    if (new Set(input.imageIds).size !== input.imageIds.length) throw invalidInput('选择的图片有重复')

    const selection: Selection = {
      imageIds: [...input.imageIds],
      transition: input.transition ?? task.config.transition,
      audioId: input.audioId ?? null,
      audioPolicy: input.audioPolicy ?? 'silence',
      totalDurationS: input.totalDurationS ?? null,
    }
    try {
      const plan = planComposition({
        imageIds: selection.imageIds,
        originalImageId: task.config.includeOriginal ? task.originalImageId : null,
        transition: selection.transition,
        transitionSeconds: task.config.transitionSeconds,
        slideSeconds: task.config.slideSeconds,
        totalDurationS: selection.totalDurationS,
        audioId: selection.audioId,
        audioPolicy: selection.audioPolicy,
        width: task.config.width,
        height: task.config.height,
        fps: task.config.fps,
      })
      return { selection, plan }
    } catch (e) {
      if (e instanceof CompositionError) throw invalidInput(e.message)
      throw e
    }
  }

  private async acceptSelection(task: Task, input: SelectionInput): Promise<{ selection: Selection; plan: CompositionPlan }> {
    const accepted = this.buildPlan(task, input)
    if (accepted.selection.audioId && !(await this.files.exists(accepted.selection.audioId))) {
      throw notFound('找不到音频文件')
    }
    return accepted
  }

  /**
   * 接受选择并进入合成阶段。选择不合法时抛错，任务停留在 awaiting_selection。
   * 合成在后台执行，返回的是 composing 状态的任务。
   */
  async submitSelection(id: string, input: SelectionInput): Promise<Task> {
    const task = await this.get(id)
    if (task.status !== TASK_STATUS.AWAITING_SELECTION) {
      throw invalidState(`任务当前状态为 ${task.status}，不能提交选择`)
    }
    const { selection, plan } = await this.acceptSelection(task, input)

    const composing = await this.transition(id, TASK_STATUS.AWAITING_SELECTION, TASK_STATUS.COMPOSING, { selection })
    if (!composing) throw invalidState('任务状态已变化，请刷新后重试')

    this.launch(id, () => this.compose(id, plan))
    return composing
  }

  private async compose(id: string, plan: CompositionPlan): Promise<void> {
    const progress = new ProgressWriter((p) => this.bumpProgress(id, p))
    let videoId: string
    try {
      videoId = await runComposition({
        plan,
        fileStore: this.files,
        composer: this.composer,
        timeoutMs: this.settings.composeTimeoutMs,
        onProgress: (p) => progress.report(p),
      })
    } catch (e) {
      await progress.flush()
      let kind: ErrorKind = ERROR_KIND.ENCODE_ERROR
      if (e instanceof CompositionError && e.kind === 'timeout') kind = ERROR_KIND.TIMEOUT
      else if (e instanceof AppError) kind = e.kind
      await this.fail(id, TASK_STATUS.COMPOSING, kind, errorMessage(e))
      return
    }
    await progress.flush()

    const done = await this.transition(id, TASK_STATUS.COMPOSING, TASK_STATUS.COMPLETED, { videoId, progress: 100 })
    if (!done) {
      // 没有任务会引用这个视频
      await this.files.remove(videoId)
    }
  }

  async cancel(id: string): Promise<Task> {
    for (;;) {
      const task = await this.get(id)
      if (
        task.status !== TASK_STATUS.QUEUED &&
        task.status !== TASK_STATUS.GENERATING &&
        task.status !== TASK_STATUS.AWAITING_SELECTION
      ) {
        throw invalidState(`任务当前状态为 ${task.status}，不能取消`)
      }
      const cancelled = await this.transition(id, task.status, TASK_STATUS.CANCELLED)
      if (cancelled) {
        this.running.get(id)?.abort()
        return cancelled
      }
    }
  }

  /**
   * 复用历史任务的原图和生成图，新建一个直接进入 awaiting_selection 的任务。
   * 新任务写入后，这些文件同时被两个任务引用，删除任何一个都不会删掉它们。
   * 配置或选择不合法时直接抛错，不会留下新任务。
   */
  async regenerate(sourceId: string, selection?: SelectionInput, overrides: Partial<TaskConfig> = {}): Promise<Task> {
    const source = await this.get(sourceId)
    const images: GeneratedImage[] = source.images.filter(isGenerated)
    if (!images.length) throw invalidState('源任务没有可复用的图片')

    const now = this.now()
    const task: Task = {
      id: nanoid(),
      status: TASK_STATUS.QUEUED,
      progress: 0,
      version: 1,
      config: { ...source.config, ...overrides, autoSelect: false },
      originalImageId: source.originalImageId,
      images,
      selection: null,
      videoId: null,
      sourceTaskId: source.id,
      error: null,
      warning: null,
      createdAtMs: now,
      updatedAtMs: now,
      completedAtMs: null,
    }
    validateTiming(task.config)
    if (selection) await this.acceptSelection(task, selection)
    await this.tasks.insert(task)

    // 写入新记录之前源任务可能已被删除，这里再确认文件仍在
    for (const img of images) {
      if (!(await this.files.exists(img.fileId))) {
        const failed = await this.fail(task.id, TASK_STATUS.QUEUED, ERROR_KIND.NOT_FOUND, `图片文件不存在: ${img.fileId}`)
        return failed ?? this.get(task.id)
      }
    }

    const ready = await this.transition(task.id, TASK_STATUS.QUEUED, TASK_STATUS.AWAITING_SELECTION, {
      progress: GENERATION_WEIGHT,
    })
    if (!ready) return this.get(task.id)
    console.log(`[orchestrator] 任务 ${task.id} 复用任务 ${source.id} 的 ${images.length} 张图片`)

    if (selection) return this.submitSelection(task.id, selection)
    return ready
  }

  /** 等待选择超时的任务置为 failed */
  async failStale(now: number = this.now()): Promise<number> {
    const stale = await this.tasks.list({
      statuses: [TASK_STATUS.AWAITING_SELECTION],
      updatedBeforeMs: now - this.settings.selectionTimeoutMs,
    })
    let count = 0
    for (const t of stale) {
      if (await this.fail(t.id, TASK_STATUS.AWAITING_SELECTION, ERROR_KIND.TIMEOUT, '等待选择超时')) count += 1
    }
    return count
  }

  /**
   * 进程启动时调用：排队中的任务重新执行；
   * 生成中/合成中的任务对应的后台工作已随上一个进程结束，置为 interrupted。
   */
  async recover(): Promise<{ resumed: number; interrupted: number }> {
    const queued = await this.tasks.list({ statuses: [TASK_STATUS.QUEUED] })
    for (const t of queued) {
      if (t.sourceTaskId) {
        await this.fail(t.id, TASK_STATUS.QUEUED, ERROR_KIND.INTERRUPTED, '进程重启，任务中断')
        continue
      }
      this.launch(t.id, () => this.admit(t.id))
    }

    let interrupted = 0
    const active = await this.tasks.list({ statuses: [TASK_STATUS.GENERATING, TASK_STATUS.COMPOSING] })
    for (const t of active) {
      const from = t.status === TASK_STATUS.GENERATING ? TASK_STATUS.GENERATING : TASK_STATUS.COMPOSING
      if (await this.fail(t.id, from, ERROR_KIND.INTERRUPTED, '进程重启，任务中断')) interrupted += 1
    }
    const resumed = queued.filter((t) => !t.sourceTaskId).length
    console.log(`[orchestrator] 恢复完成：重新排队 ${resumed} 个，中断 ${interrupted} 个`)
    return { resumed, interrupted }
  }

  /** 生成中和合成中的任务不能删除 */
  async deleteTask(id: string): Promise<DeletionReport> {
    const task = await this.get(id)
    if (task.status === TASK_STATUS.GENERATING || task.status === TASK_STATUS.COMPOSING) {
      throw invalidState(`任务当前状态为 ${task.status}，请等待结束后再删除`)
    }
    return deleteTaskWithFiles(this.tasks, this.files, task)
  }

  sweepOrphans(minAgeMs: number = CONFIG.ORPHAN_GRACE_S * 1000): Promise<number> {
    return sweepOrphans(this.tasks, this.files, { minAgeMs, now: this.now() })
  }
}
