import fs from 'node:fs'
import path from 'node:path'
import { nanoid } from 'nanoid'

import { all, get, run, type Db } from '../common/db.js'
import { errnoCode } from '../common/errors.js'
import { FILE_KIND, type FileKind, type FileRow } from '../common/types.js'

const DIR_BY_KIND: Record<FileKind, string> = {
  [FILE_KIND.UPLOAD]: 'uploads',
  [FILE_KIND.GENERATED_IMAGE]: 'generated',
  [FILE_KIND.VIDEO]: 'videos',
}

const EXT_BY_MIME: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
  'image/gif': '.gif',
  'image/bmp': '.bmp',
  'audio/mpeg': '.mp3',
  'audio/wav': '.wav',
  'audio/x-wav': '.wav',
  'audio/aac': '.aac',
  'audio/ogg': '.ogg',
  'audio/mp4': '.m4a',
  'video/mp4': '.mp4',
}

function ensureDir(p: string) {
  if (!fs.existsSync(p)) fs.mkdirSync(p, { recursive: true })
}

async function safeUnlink(p: string) {
  try {
    await fs.promises.unlink(p)
  } catch (e) {
    if (errnoCode(e) !== 'ENOENT') throw e
  }
}

export type PutOptions = {
  originalName?: string
  now?: number
}

/**
 * 文件仓库：字节落盘，元数据进 files 表。文件一旦写入不再修改。
 */
export class FileStore {
  private readonly tmpDir: string

  constructor(
    private readonly db: Db,
    private readonly rootDir: string,
  ) {
    this.tmpDir = path.join(rootDir, 'tmp')
    ensureDir(this.tmpDir)
    for (const dir of Object.values(DIR_BY_KIND)) ensureDir(path.join(rootDir, dir))
  }

  /** 先写临时文件再 rename，再插入元数据；中途失败不会留下可见的半成品 */
  async put(bytes: Buffer, kind: FileKind, contentType: string, opts: PutOptions = {}): Promise<string> {
    const id = nanoid()
    const ext = EXT_BY_MIME[contentType] ?? ''
    const tmpPath = path.join(this.tmpDir, `${id}.part`)
    const absPath = path.join(this.rootDir, DIR_BY_KIND[kind], `${id}${ext}`)

    await fs.promises.writeFile(tmpPath, bytes)
    try {
      await fs.promises.rename(tmpPath, absPath)
    } catch (e) {
      await safeUnlink(tmpPath)
      throw e
    }

    const row: FileRow = {
      id,
      kind,
      original_name: opts.originalName || `${id}${ext}`,
      mime_type: contentType,
      size_bytes: bytes.length,
      abs_path: absPath,
      created_at_ms: opts.now ?? Date.now(),
    }
    try {
      await run(
        this.db,
        `INSERT INTO files (id, kind, original_name, mime_type, size_bytes, abs_path, created_at_ms)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [row.id, row.kind, row.original_name, row.mime_type, row.size_bytes, row.abs_path, row.created_at_ms],
      )
    } catch (e) {
      await safeUnlink(absPath)
      throw e
    }
    return id
  }

  async stat(id: string): Promise<FileRow | null> {
    const row = await get<FileRow>(this.db, `SELECT * FROM files WHERE id = ?`, [id])
    return row ?? null
  }

  /** 元数据存在但磁盘文件已丢失时同样返回 null */
  async get(id: string): Promise<Buffer | null> {
    const row = await this.stat(id)
    if (!row) return null
    try {
      return await fs.promises.readFile(row.abs_path)
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return null
      throw e
    }
  }

  async exists(id: string): Promise<boolean> {
    const row = await this.stat(id)
    return row !== null && fs.existsSync(row.abs_path)
  }

  async list(): Promise<FileRow[]> {
    return all<FileRow>(this.db, `SELECT * FROM files ORDER BY created_at_ms ASC, id ASC`)
  }

  /** 无条件删除，引用检查由调用方负责 */
  async remove(id: string): Promise<boolean> {
    const row = await this.stat(id)
    if (!row) return false
    await safeUnlink(row.abs_path)
    await run(this.db, `DELETE FROM files WHERE id = ?`, [id])
    return true
  }
}
