import axios from 'axios'
import { CONFIG } from '../common/config.js'
import type { StyleFailureKind } from '../common/types.js'

export type GenerateRequest = {
  image: Buffer
  contentType: string
  style: string
  prompt: string
  signal: AbortSignal
}

export type GeneratedImageBytes = {
  bytes: Buffer
  contentType: string
}

/** 外部风格化能力。调用之间没有顺序或状态上的假设 */
export interface ImageGenerator {
  generate(req: GenerateRequest): Promise<GeneratedImageBytes>
}

export type GenerationFailureKind = Exclude<StyleFailureKind, 'store_unavailable'>

export class GenerationError extends Error {
  constructor(
    public readonly kind: GenerationFailureKind,
    message: string,
  ) {
    super(message)
    this.name = 'GenerationError'
  }

  get transient(): boolean {
    return this.kind === 'rate_limited' || this.kind === 'timeout'
  }
}

export function buildStylePrompt(style: string): string {
  return (
    `Keep the composition and the position of every person exactly as in the source image. ` +
    `Restyle the whole picture, faces included, as ${style}. The change of style must be obvious.`
  )
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null
}

const DATA_URL_RE = /data:image\/(?:png|jpeg|jpg|webp);base64,[A-Za-z0-9+/=]+/

/**
 * 从 chat completions 响应里找图片。
 * 图片模型把结果放在 choices[0].message.images[]，部分模型放在 content 数组里，最后兜底全文搜索 data URL。
 */
export function extractImageDataUrl(data: unknown): string | null {
  const choices = isRecord(data) ? data.choices : undefined
  const first = Array.isArray(choices) ? choices[0] : undefined
  const message = isRecord(first) ? first.message : undefined

  if (isRecord(message)) {
    const images = message.images
    if (Array.isArray(images) && images.length > 0) {
      const img = images[0]
      const url = isRecord(img) && isRecord(img.image_url) ? img.image_url.url : undefined
      if (typeof url === 'string' && url.startsWith('data:image/')) return url
    }

    const content = message.content
    if (Array.isArray(content)) {
      for (const item of content) {
        if (!isRecord(item)) continue
        const nested = isRecord(item.image_url) ? item.image_url.url : undefined
        if (typeof nested === 'string' && nested.startsWith('data:image/')) return nested
        if (typeof item.url === 'string' && item.url.startsWith('data:image/')) return item.url
        if (typeof item.image_base64 === 'string') return `data:image/png;base64,${item.image_base64}`
      }
    }
  }

  const match = JSON.stringify(data ?? null).match(DATA_URL_RE)
  return match ? match[0] : null
}

export function decodeDataUrl(dataUrl: string): GeneratedImageBytes {
  const m = /^data:([^;]+);base64,(.*)$/s.exec(dataUrl)
  if (!m) throw new GenerationError('upstream_error', '无法解析图片 data URL')
  return { contentType: m[1], bytes: Buffer.from(m[2], 'base64') }
}

function classifyHttpError(error: unknown): GenerationError {
  if (error instanceof GenerationError) return error
  if (axios.isCancel(error)) return new GenerationError('timeout', '请求已取消')
  if (axios.isAxiosError(error)) {
    const status = error.response?.status
    if (status === 429) return new GenerationError('rate_limited', '触发速率限制')
    if (status === 400 || status === 413 || status === 422) {
      return new GenerationError('invalid_input', `OpenRouter 拒绝了输入 (${status})`)
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new GenerationError('timeout', 'API 请求超时')
    }
    return new GenerationError('upstream_error', `OpenRouter API 错误 ${status ?? error.code ?? ''}: ${error.message}`)
  }
  return new GenerationError('upstream_error', error instanceof Error ? error.message : String(error))
}

/**
 * OpenRouter 图片模型适配器，走 chat completions 接口，原图以 data URL 形式随 prompt 一起发送。
 */
export class OpenRouterImageGenerator implements ImageGenerator {
  constructor(
    private readonly apiKey: string,
    private readonly model: string = CONFIG.OPENROUTER_MODEL,
    private readonly baseUrl: string = CONFIG.OPENROUTER_BASE_URL,
    private readonly timeoutMs: number = 120_000,
  ) {
    if (!apiKey) {
      throw new Error('OpenRouter API key is required')
    }
  }

  async generate(req: GenerateRequest): Promise<GeneratedImageBytes> {
    const sourceUrl = `data:${req.contentType};base64,${req.image.toString('base64')}`
    console.log(`[OpenRouter] 生成风格: ${req.style} (${this.model})`)

    let data: unknown
    try {
      const response = await axios.post(
        `${this.baseUrl}/chat/completions`,
        {
          model: this.model,
          messages: [
            {
              role: 'user',
              content: [
                { type: 'text', text: req.prompt },
                { type: 'image_url', image_url: { url: sourceUrl } },
              ],
            },
          ],
        },
        {
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
          },
          timeout: this.timeoutMs,
          signal: req.signal,
        },
      )
      data = response.data
    } catch (error) {
      throw classifyHttpError(error)
    }

    const dataUrl = extractImageDataUrl(data)
    if (!dataUrl) {
      throw new GenerationError('upstream_error', '未能从 API 响应中提取到图片数据')
    }
    return decodeDataUrl(dataUrl)
  }
}
