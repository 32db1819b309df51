export const TASK_STATUS = {
  QUEUED: 'queued',
  GENERATING: 'generating',
  AWAITING_SELECTION: 'awaiting_selection',
  COMPOSING: 'composing',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const

export type TaskStatus = (typeof TASK_STATUS)[keyof typeof TASK_STATUS]

export const FILE_KIND = {
  UPLOAD: 'upload',
  GENERATED_IMAGE: 'generated_image',
  VIDEO: 'video',
} as const

export type FileKind = (typeof FILE_KIND)[keyof typeof FILE_KIND]

export const ERROR_KIND = {
  GENERATION_EXHAUSTED: 'generation_exhausted',
  PARTIAL_GENERATION: 'partial_generation',
  TIMEOUT: 'timeout',
  ENCODE_ERROR: 'encode_error',
  NOT_FOUND: 'not_found',
  PROTECTED: 'protected',
  STORE_UNAVAILABLE: 'store_unavailable',
  INVALID_INPUT: 'invalid_input',
  INVALID_STATE: 'invalid_state',
  INTERRUPTED: 'interrupted',
} as const

export type ErrorKind = (typeof ERROR_KIND)[keyof typeof ERROR_KIND]

/** 单个风格生成失败的原因 */
export type StyleFailureKind = 'rate_limited' | 'invalid_input' | 'upstream_error' | 'timeout' | 'store_unavailable'

export type AudioPolicy = 'silence' | 'loop'

export type FileRow = {
  id: string
  kind: FileKind
  original_name: string
  mime_type: string
  size_bytes: number
  abs_path: string
  created_at_ms: number
}

export type TaskRow = {
  id: string
  status: TaskStatus
  version: number
  doc_json: string
  created_at_ms: number
  updated_at_ms: number
}

/** 单个转场名，或按边界依次循环使用的转场列表 */
export type TransitionSpec = string | string[]

/** 创建任务时固定下来的配置快照 */
export type TaskConfig = {
  styleCount: number
  styles: string[]
  width: number
  height: number
  fps: number
  slideSeconds: number
  transitionSeconds: number
  transition: TransitionSpec
  concurrency: number
  includeOriginal: boolean
  autoSelect: boolean
}

export type GeneratedImage = {
  index: number
  style: string
  fileId: string
}

export type FailedImage = {
  index: number
  style: string
  error: { kind: StyleFailureKind; message: string }
}

export type TaskImage = GeneratedImage | FailedImage

export type Selection = {
  imageIds: string[]
  transition: TransitionSpec
  audioId: string | null
  audioPolicy: AudioPolicy
  totalDurationS: number | null
}

export type TaskError = {
  kind: ErrorKind
  message: string
}

export type TaskWarning = {
  kind: 'partial_generation'
  message: string
  failed: number
}

export type Task = {
  id: string
  status: TaskStatus
  progress: number
  version: number
  config: TaskConfig
  originalImageId: string
  images: TaskImage[]
  selection: Selection | null
  videoId: string | null
  sourceTaskId: string | null
  error: TaskError | null
  warning: TaskWarning | null
  createdAtMs: number
  updatedAtMs: number
  completedAtMs: number | null
}

export function isGenerated(image: TaskImage): image is GeneratedImage {
  return 'fileId' in image
}
