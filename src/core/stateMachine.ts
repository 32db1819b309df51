import { TASK_STATUS, type TaskStatus } from '../common/types.js'

/**
 * 任务状态迁移表。只能向前走，终态没有出边。
 * queued -> awaiting_selection 只给「复用历史图片重新生成视频」的任务用。
 */
export const TRANSITIONS = {
  [TASK_STATUS.QUEUED]: [
    TASK_STATUS.GENERATING,
    TASK_STATUS.AWAITING_SELECTION,
    TASK_STATUS.FAILED,
    TASK_STATUS.CANCELLED,
  ],
  [TASK_STATUS.GENERATING]: [TASK_STATUS.AWAITING_SELECTION, TASK_STATUS.FAILED, TASK_STATUS.CANCELLED],
  [TASK_STATUS.AWAITING_SELECTION]: [TASK_STATUS.COMPOSING, TASK_STATUS.FAILED, TASK_STATUS.CANCELLED],
  [TASK_STATUS.COMPOSING]: [TASK_STATUS.COMPLETED, TASK_STATUS.FAILED],
  [TASK_STATUS.COMPLETED]: [],
  [TASK_STATUS.FAILED]: [],
  [TASK_STATUS.CANCELLED]: [],
} as const satisfies Record<TaskStatus, readonly TaskStatus[]>

export type NextStatus<S extends TaskStatus> = (typeof TRANSITIONS)[S][number]

export type TerminalStatus = {
  [S in TaskStatus]: [NextStatus<S>] extends [never] ? S : never
}[TaskStatus]

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  const allowed: readonly TaskStatus[] = TRANSITIONS[from]
  return allowed.includes(to)
}

export function isTerminal(status: TaskStatus): status is TerminalStatus {
  return TRANSITIONS[status].length === 0
}
