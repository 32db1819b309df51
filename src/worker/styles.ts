import fs from 'node:fs'
import { z } from 'zod'
import { CONFIG } from '../common/config.js'

const CatalogSchema = z.array(z.string().min(1)).min(1)

export function loadStyleCatalog(file: string = CONFIG.STYLE_CATALOG_PATH): string[] {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))
  return CatalogSchema.parse(raw)
}

function sample<T>(items: readonly T[], n: number, random: () => number): T[] {
  const pool = [...items]
  const out: T[] = []
  while (out.length < n && pool.length) {
    const i = Math.floor(random() * pool.length)
    out.push(pool.splice(i, 1)[0])
  }
  return out
}

/**
 * 确定本次要生成的风格列表：去重；不够 count 个时从风格库随机补齐，多了则截断。
 * 风格库本身不够时返回的数量可能少于 count。
 */
export function selectStyles(
  requested: readonly string[],
  count: number,
  catalog: readonly string[],
  random: () => number = Math.random,
): string[] {
  const picked: string[] = []
  for (const s of requested) {
    const style = s.trim()
    if (style && !picked.includes(style)) picked.push(style)
  }
  if (picked.length >= count) return picked.slice(0, count)
  const remaining = catalog.filter((s) => !picked.includes(s))
  return [...picked, ...sample(remaining, count - picked.length, random)]
}
