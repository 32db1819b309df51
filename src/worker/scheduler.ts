import { CONFIG } from '../common/config.js'
import { errorMessage } from '../common/errors.js'
import { FILE_KIND, isGenerated, type FailedImage, type StyleFailureKind, type TaskImage } from '../common/types.js'
import type { FileStore } from '../store/fileStore.js'
import { buildStylePrompt, GenerationError, type GeneratedImageBytes, type ImageGenerator } from './generator.js'

/** 生成阶段在总进度里占的比例，合成阶段占剩下的部分 */
export const GENERATION_WEIGHT = 40

export type GenerationProgress = {
  completed: number
  total: number
  percent: number
}

export type RunGenerationOptions = {
  image: Buffer
  contentType: string
  styles: readonly string[]
  concurrency: number
  timeoutMs: number
  generator: ImageGenerator
  fileStore: FileStore
  weight?: number
  maxRetries?: number
  retryDelayMs?: number
  /** 外部取消（任务被取消），效果同超时：立即汇总，进行中的调用被放弃 */
  signal?: AbortSignal
  onProgress?: (progress: GenerationProgress) => void
}

export type GenerationResult = {
  /** 按请求顺序排列，与完成顺序无关 */
  images: TaskImage[]
  succeeded: number
  failed: number
  timedOut: boolean
  cancelled: boolean
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve()
    const timer = setTimeout(done, ms)
    function done() {
      clearTimeout(timer)
      signal.removeEventListener('abort', done)
      resolve()
    }
    signal.addEventListener('abort', done, { once: true })
  })
}

function failure(index: number, style: string, kind: StyleFailureKind, message: string): FailedImage {
  return { index, style, error: { kind, message } }
}

async function generateOne(
  index: number,
  style: string,
  opts: RunGenerationOptions,
  signal: AbortSignal,
): Promise<TaskImage> {
  // 只对瞬时错误重试，且每个风格最多 1 次
  const maxRetries = Math.min(1, opts.maxRetries ?? CONFIG.GENERATION_MAX_RETRIES)
  const retryDelayMs = opts.retryDelayMs ?? CONFIG.GENERATION_RETRY_DELAY_MS

  for (let attempt = 0; ; attempt++) {
    let result: GeneratedImageBytes
    try {
      result = await opts.generator.generate({
        image: opts.image,
        contentType: opts.contentType,
        style,
        prompt: buildStylePrompt(style),
        signal,
      })
    } catch (e) {
      const err = e instanceof GenerationError ? e : new GenerationError('upstream_error', errorMessage(e))
      if (err.transient && attempt < maxRetries && !signal.aborted) {
        console.warn(`[scheduler] 风格 '${style}' ${err.kind}，${retryDelayMs}ms 后重试`)
        await sleep(retryDelayMs, signal)
        if (signal.aborted) return failure(index, style, 'timeout', '重试等待期间阶段已结束')
        continue
      }
      console.warn(`[scheduler] 风格 '${style}' 生成失败: ${err.message}`)
      return failure(index, style, err.kind, err.message)
    }

    if (signal.aborted) return failure(index, style, 'timeout', '结果到达时阶段已结束，已丢弃')

    let fileId: string
    try {
      fileId = await opts.fileStore.put(result.bytes, FILE_KIND.GENERATED_IMAGE, result.contentType)
    } catch (e) {
      return failure(index, style, 'store_unavailable', errorMessage(e))
    }
    if (signal.aborted) {
      // 写入期间阶段已结束：这个结果不会挂到任务上，直接删掉
      await opts.fileStore.remove(fileId)
      return failure(index, style, 'timeout', '结果到达时阶段已结束，已丢弃')
    }
    return { index, style, fileId }
  }
}

/**
 * 按风格并发生成，任何时刻最多 concurrency 个调用在途。
 * 单个风格的失败只记录不抛出；全部完成或阶段超时后汇总。
 */
export async function runGeneration(opts: RunGenerationOptions): Promise<GenerationResult> {
  const total = opts.styles.length
  const weight = opts.weight ?? GENERATION_WEIGHT
  const outcomes: Array<TaskImage | undefined> = new Array(total).fill(undefined)
  const abort = new AbortController()
  const forwardAbort = () => abort.abort()
  if (opts.signal?.aborted) abort.abort()
  else opts.signal?.addEventListener('abort', forwardAbort, { once: true })

  let next = 0
  let completed = 0

  const settle = (outcome: TaskImage) => {
    if (abort.signal.aborted || outcomes[outcome.index]) return
    outcomes[outcome.index] = outcome
    completed += 1
    opts.onProgress?.({ completed, total, percent: Math.round((completed / total) * weight) })
  }

  const lane = async () => {
    while (!abort.signal.aborted && next < total) {
      const index = next++
      settle(await generateOne(index, opts.styles[index], opts, abort.signal))
    }
  }

  const laneCount = Math.min(Math.max(1, opts.concurrency), total)
  const lanes = Promise.all(Array.from({ length: laneCount }, lane))

  let timer: NodeJS.Timeout | undefined
  const deadline = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), opts.timeoutMs)
  })
  const stopped = new Promise<'cancelled'>((resolve) => {
    if (abort.signal.aborted) return resolve('cancelled')
    abort.signal.addEventListener('abort', () => resolve('cancelled'), { once: true })
  })

  let winner: 'done' | 'timeout' | 'cancelled'
  try {
    winner = await Promise.race([lanes.then(() => 'done' as const), deadline, stopped])
  } finally {
    clearTimeout(timer)
    opts.signal?.removeEventListener('abort', forwardAbort)
  }

  if (winner !== 'done') {
    // 在途调用收到取消信号；它们的结果不再等待，到达后也会被丢弃
    abort.abort()
    void lanes.catch((e: unknown) => console.error('[scheduler] 被放弃的生成调用出错:', errorMessage(e)))
    console.warn(`[scheduler] 生成阶段${winner === 'timeout' ? '超时' : '被取消'}，已完成 ${completed}/${total}`)
  }

  const reason = winner === 'timeout' ? '生成阶段超时' : '任务已取消'
  const images = outcomes.map((o, index) => o ?? failure(index, opts.styles[index], 'timeout', reason))
  const succeeded = images.filter(isGenerated).length

  return {
    images,
    succeeded,
    failed: total - succeeded,
    timedOut: winner === 'timeout',
    cancelled: winner === 'cancelled',
  }
}
