import { errorMessage, notFound } from '../common/errors.js'
import { FILE_KIND, type AudioPolicy, type TransitionSpec } from '../common/types.js'
import type { FileStore } from '../store/fileStore.js'
import { GENERATION_WEIGHT } from './scheduler.js'

export type ComposeRequest = {
  frames: Buffer[]
  /** 每帧的展示时长（秒），已对齐到整帧 */
  durations: number[]
  /** 第 k 个边界用 transitions[k % length] */
  transitions: string[]
  transitionSeconds: number
  /** 画面总时长，音频按它截断或补齐 */
  totalSeconds: number
  audio: Buffer | null
  audioPolicy: AudioPolicy
  width: number
  height: number
  fps: number
}

/** 外部视频合成能力，onProgress 回报 0-100 */
export interface VideoComposer {
  compose(req: ComposeRequest, onProgress: (percent: number) => void, signal: AbortSignal): Promise<Buffer>
}

export type CompositionFailureKind = 'encode_error' | 'invalid_params' | 'timeout'

export class CompositionError extends Error {
  constructor(
    public readonly kind: CompositionFailureKind,
    message: string,
  ) {
    super(message)
    this.name = 'CompositionError'
  }
}

export type PlanInput = {
  imageIds: readonly string[]
  originalImageId: string | null
  transition: TransitionSpec
  transitionSeconds: number
  slideSeconds: number
  totalDurationS: number | null
  audioId: string | null
  audioPolicy: AudioPolicy
  width: number
  height: number
  fps: number
}

export type CompositionPlan = {
  frameIds: string[]
  durations: number[]
  transitions: string[]
  transitionSeconds: number
  totalSeconds: number
  audioId: string | null
  audioPolicy: AudioPolicy
  width: number
  height: number
  fps: number
}

function roundMs(seconds: number): number {
  return Math.round(seconds * 1000) / 1000
}

/** 转场名会拼进 ffmpeg 滤镜图，只允许 xfade 名称用到的字符 */
export const TRANSITION_ID_PATTERN = /^[a-z0-9_]+$/

export function normalizeTransitions(spec: TransitionSpec): string[] {
  const names = typeof spec === 'string' ? [spec] : [...spec]
  if (!names.length) throw new CompositionError('invalid_params', '转场列表不能为空')
  for (const name of names) {
    if (!TRANSITION_ID_PATTERN.test(name)) {
      throw new CompositionError('invalid_params', `转场名称不合法: ${JSON.stringify(name)}`)
    }
  }
  return names
}

/**
 * 确定帧顺序和时长。
 * 没有指定总时长时，每张都是 slideSeconds 取整帧。
 * 指定了总时长时，先把总时长取整帧，再把 Σ时长 = 总时长 + (n - 1) × 转场 按整帧均分，
 * 余数给最后一张，保证 Σ时长 − (n − 1) × 转场 正好等于总时长。
 */
export function planComposition(input: PlanInput): CompositionPlan {
  const frameIds = input.originalImageId ? [input.originalImageId, ...input.imageIds] : [...input.imageIds]
  if (!input.imageIds.length) {
    throw new CompositionError('invalid_params', '至少需要选择一张图片')
  }
  if (new Set(frameIds).size !== frameIds.length) {
    throw new CompositionError('invalid_params', '图片序列中存在重复')
  }
  if (input.fps <= 0 || input.width <= 0 || input.height <= 0) {
    throw new CompositionError('invalid_params', '分辨率和帧率必须为正数')
  }
  const transitions = normalizeTransitions(input.transition)

  const n = frameIds.length
  const { fps } = input
  const transitionSeconds = n > 1 ? Math.max(0, input.transitionSeconds) : 0

  let durations: number[]
  let totalSeconds: number
  if (input.totalDurationS !== null) {
    totalSeconds = Math.max(1, Math.round(input.totalDurationS * fps)) / fps
    const sum = totalSeconds + (n - 1) * transitionSeconds
    // 1e-9 吸收浮点误差，避免 112 被算成 111.999…
    const base = Math.floor((sum * fps) / n + 1e-9) / fps
    durations = frameIds.map((_id, i) => (i < n - 1 ? base : sum - (n - 1) * base))
  } else {
    const perSlide = Math.max(1, Math.round(input.slideSeconds * fps)) / fps
    durations = frameIds.map(() => perSlide)
    totalSeconds = n * perSlide - (n - 1) * transitionSeconds
  }

  // 最后一张拿余数，最短的总是 durations[0]
  if (durations[0] <= 0 || transitionSeconds >= durations[0]) {
    throw new CompositionError(
      'invalid_params',
      `转场时长 ${transitionSeconds}s 不能超过单张时长 ${roundMs(Math.max(0, durations[0]))}s`,
    )
  }

  return {
    frameIds,
    durations,
    transitions,
    transitionSeconds,
    totalSeconds: roundMs(totalSeconds),
    audioId: input.audioId,
    audioPolicy: input.audioPolicy,
    width: input.width,
    height: input.height,
    fps,
  }
}

/** 合成阶段的 0-100 映射到任务总进度的 GENERATION_WEIGHT..99，100 留给完成 */
export function toTaskProgress(percent: number): number {
  const p = Math.max(0, Math.min(100, percent))
  return Math.min(99, GENERATION_WEIGHT + Math.round((p / 100) * (100 - GENERATION_WEIGHT)))
}

export type RunCompositionOptions = {
  plan: CompositionPlan
  fileStore: FileStore
  composer: VideoComposer
  timeoutMs: number
  onProgress?: (taskProgress: number) => void
}

/**
 * 读取帧和音频，交给合成能力，成功后把视频写入文件仓库并返回 fileId。
 * 失败或超时都不会留下视频文件。
 */
export async function runComposition(opts: RunCompositionOptions): Promise<string> {
  const { plan } = opts
  const frames: Buffer[] = []
  for (const id of plan.frameIds) {
    const bytes = await opts.fileStore.get(id)
    if (!bytes) throw notFound(`图片文件不存在: ${id}`)
    frames.push(bytes)
  }
  let audio: Buffer | null = null
  if (plan.audioId) {
    audio = await opts.fileStore.get(plan.audioId)
    if (!audio) throw notFound(`音频文件不存在: ${plan.audioId}`)
  }

  const abort = new AbortController()
  let lastPercent = 0
  const onProgress = (percent: number) => {
    // 丢弃乱序或超时后的回报，保证单调
    if (abort.signal.aborted || percent <= lastPercent) return
    lastPercent = percent
    opts.onProgress?.(toTaskProgress(percent))
  }

  const composing = opts.composer.compose(
    {
      frames,
      durations: plan.durations,
      transitions: plan.transitions,
      transitionSeconds: plan.transitionSeconds,
      totalSeconds: plan.totalSeconds,
      audio,
      audioPolicy: plan.audioPolicy,
      width: plan.width,
      height: plan.height,
      fps: plan.fps,
    },
    onProgress,
    abort.signal,
  )

  let timer: NodeJS.Timeout | undefined
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new CompositionError('timeout', '视频合成超时')), opts.timeoutMs)
  })

  let video: Buffer
  try {
    video = await Promise.race([composing, deadline])
  } catch (e) {
    abort.abort()
    if (e instanceof CompositionError) {
      if (e.kind === 'timeout') {
        void composing.catch((err: unknown) => console.warn('[compose] 超时后合成调用出错:', errorMessage(err)))
      }
      throw e
    }
    throw new CompositionError('encode_error', errorMessage(e))
  } finally {
    clearTimeout(timer)
  }

  return opts.fileStore.put(video, FILE_KIND.VIDEO, 'video/mp4')
}
