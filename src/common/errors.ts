import { ERROR_KIND, type ErrorKind } from './types.js'

/**
 * 业务错误，带一个粗粒度的 kind，API 层据此映射 HTTP 状态码
 */
export class AppError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
  ) {
    super(message)
    this.name = 'AppError'
  }
}

export function notFound(message: string): AppError {
  return new AppError(ERROR_KIND.NOT_FOUND, message)
}

export function invalidInput(message: string): AppError {
  return new AppError(ERROR_KIND.INVALID_INPUT, message)
}

export function invalidState(message: string): AppError {
  return new AppError(ERROR_KIND.INVALID_STATE, message)
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}

export const HTTP_STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  [ERROR_KIND.NOT_FOUND]: 404,
  [ERROR_KIND.INVALID_INPUT]: 400,
  [ERROR_KIND.INVALID_STATE]: 409,
  [ERROR_KIND.STORE_UNAVAILABLE]: 503,
}

export function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code
  return undefined
}
