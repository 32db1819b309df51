import dotenv from 'dotenv'
import path from 'node:path'

// 在开发模式：src/common/config.ts -> ../../.env
// 在编译后：dist/common/config.js -> ../../.env
const envPath = path.resolve(__dirname, '../../.env')
dotenv.config({ path: envPath })

function toInt(v: string | undefined, fallback: number): number {
  if (v === undefined || v.trim() === '') return fallback
  const n = Number(v)
  return Number.isFinite(n) ? Math.floor(n) : fallback
}

function toNumber(v: string | undefined, fallback: number): number {
  if (v === undefined || v.trim() === '') return fallback
  const n = Number(v)
  return Number.isFinite(n) ? n : fallback
}

// 逗号分隔时按边界循环
function toTransition(v: string | undefined, fallback: string): string | string[] {
  const names = (v ?? '').split(',').map((s) => s.trim()).filter(Boolean)
  if (!names.length) return fallback
  return names.length === 1 ? names[0] : names
}

export const CONFIG = {
  PORT: toInt(process.env.PORT, 3000),
  DATA_DIR: process.env.DATA_DIR || path.resolve(__dirname, '../../data'),
  MAX_UPLOAD_MB: toInt(process.env.MAX_UPLOAD_MB, 20),

  // 风格图生成
  GENERATION_CONCURRENCY: toInt(process.env.GENERATION_CONCURRENCY, 2),
  GENERATION_TIMEOUT_S: toInt(process.env.GENERATION_TIMEOUT_S, 600),
  GENERATION_RETRY_DELAY_MS: toInt(process.env.GENERATION_RETRY_DELAY_MS, 5000),
  // 每个风格最多重试 1 次
  GENERATION_MAX_RETRIES: Math.min(1, Math.max(0, toInt(process.env.GENERATION_MAX_RETRIES, 1))),
  MAX_STYLE_COUNT: toInt(process.env.MAX_STYLE_COUNT, 20),
  STYLE_CATALOG_PATH: process.env.STYLE_CATALOG_PATH || path.resolve(__dirname, '../../config/styles.json'),

  // 视频合成
  COMPOSE_TIMEOUT_S: toInt(process.env.COMPOSE_TIMEOUT_S, 600),
  SELECTION_TIMEOUT_S: toInt(process.env.SELECTION_TIMEOUT_S, 24 * 3600),
  DEFAULT_FPS: toInt(process.env.DEFAULT_FPS, 30),
  DEFAULT_WIDTH: toInt(process.env.DEFAULT_WIDTH, 1280),
  DEFAULT_HEIGHT: toInt(process.env.DEFAULT_HEIGHT, 720),
  DEFAULT_SLIDE_SECONDS: toNumber(process.env.DEFAULT_SLIDE_SECONDS, 3),
  DEFAULT_TRANSITION_SECONDS: toNumber(process.env.DEFAULT_TRANSITION_SECONDS, 0.6),
  DEFAULT_TRANSITION: toTransition(process.env.DEFAULT_TRANSITION, 'fade'),
  VIDEO_BITRATE: process.env.VIDEO_BITRATE || '6M',
  AUDIO_BITRATE: process.env.AUDIO_BITRATE || '192k',

  // 清理
  ORPHAN_GRACE_S: toInt(process.env.ORPHAN_GRACE_S, 600),
  RETENTION_HOURS: toInt(process.env.RETENTION_HOURS, 720),
  SWEEP_INTERVAL_S: toInt(process.env.SWEEP_INTERVAL_S, 1800),

  FFMPEG_PATH: process.env.FFMPEG_PATH || 'ffmpeg', // FFmpeg 可执行文件路径，默认使用系统 PATH
  OPENROUTER_API_KEY: process.env.OPENROUTER_API_KEY || '',
  OPENROUTER_BASE_URL: process.env.OPENROUTER_BASE_URL || 'https://openrouter.ai/api/v1',
  OPENROUTER_MODEL: process.env.OPENROUTER_MODEL || 'google/gemini-2.5-flash-image-preview',
} as const

export type Config = typeof CONFIG
