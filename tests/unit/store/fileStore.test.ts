import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import { AppError } from '../../../src/common/errors.js'
import { closeDb, initDb, openDb } from '../../../src/common/db.js'
import { FileStore } from '../../../src/store/fileStore.js'
import { createStores, PNG, type TestStores } from '../../helpers/fixtures.js'

describe('FileStore', () => {
  let stores: TestStores

  beforeEach(async () => {
    stores = await createStores()
  })

  afterEach(async () => {
    await stores.close()
  })

  it('should store bytes and metadata', async () => {
    const id = await stores.files.put(PNG, 'upload', 'image/png', { originalName: 'me.png', now: 5_000 })

    const row = await stores.files.stat(id)
    expect(row).toEqual({
      id,
      kind: 'upload',
      original_name: 'me.png',
      mime_type: 'image/png',
      size_bytes: PNG.length,
      abs_path: path.join(stores.dir, 'uploads', `${id}.png`),
      created_at_ms: 5_000,
    })
    expect(await stores.files.get(id)).toEqual(PNG)
    expect(await stores.files.exists(id)).toBe(true)
  })

  it('should place files by kind', async () => {
    const img = await stores.files.put(PNG, 'generated_image', 'image/png')
    const video = await stores.files.put(Buffer.from('v'), 'video', 'video/mp4')

    expect((await stores.files.stat(img))?.abs_path).toBe(path.join(stores.dir, 'generated', `${img}.png`))
    expect((await stores.files.stat(video))?.abs_path).toBe(path.join(stores.dir, 'videos', `${video}.mp4`))
    expect(fs.readdirSync(path.join(stores.dir, 'tmp'))).toEqual([])
  })

  it('should return null for unknown ids', async () => {
    expect(await stores.files.get('nope')).toBeNull()
    expect(await stores.files.stat('nope')).toBeNull()
    expect(await stores.files.exists('nope')).toBe(false)
  })

  it('should return null when the bytes are gone from disk', async () => {
    const id = await stores.files.put(PNG, 'upload', 'image/png')
    const row = await stores.files.stat(id)
    fs.unlinkSync(row?.abs_path ?? '')

    expect(await stores.files.get(id)).toBeNull()
    expect(await stores.files.exists(id)).toBe(false)
  })

  it('should list files oldest first', async () => {
    const later = await stores.files.put(PNG, 'upload', 'image/png', { now: 2_000 })
    const earlier = await stores.files.put(PNG, 'upload', 'image/png', { now: 1_000 })

    expect((await stores.files.list()).map((r) => r.id)).toEqual([earlier, later])
  })

  it('should remove bytes and metadata', async () => {
    const id = await stores.files.put(PNG, 'upload', 'image/png')
    const row = await stores.files.stat(id)

    expect(await stores.files.remove(id)).toBe(true)
    expect(fs.existsSync(row?.abs_path ?? '')).toBe(false)
    expect(await stores.files.stat(id)).toBeNull()
    expect(await stores.files.remove(id)).toBe(false)
  })
})

describe('FileStore with an unavailable database', () => {
  it('should raise store_unavailable and leave no file behind', async () => {
    const db = openDb(':memory:')
    await initDb(db)
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stylize-closed-'))
    const files = new FileStore(db, dir)
    await closeDb(db)

    try {
      const err = await files.put(PNG, 'upload', 'image/png').catch((e: unknown) => e)
      expect(err).toBeInstanceOf(AppError)
      expect(err).toMatchObject({ kind: 'store_unavailable' })
      expect(fs.readdirSync(path.join(dir, 'uploads'))).toEqual([])
      expect(fs.readdirSync(path.join(dir, 'tmp'))).toEqual([])
    } finally {
      fs.rmSync(dir, { recursive: true, force: true })
    }
  })
})
