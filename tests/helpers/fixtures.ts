import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import { closeDb, initDb, openDb, type Db } from '../../src/common/db.js'
import { TASK_STATUS, type Task } from '../../src/common/types.js'
import { FileStore } from '../../src/store/fileStore.js'
import { TaskStore } from '../../src/store/taskStore.js'
import type { ComposeRequest, VideoComposer } from '../../src/worker/composition.js'
import {
  GenerationError,
  type GenerateRequest,
  type GeneratedImageBytes,
  type ImageGenerator,
} from '../../src/worker/generator.js'

export const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01])

export type TestStores = {
  db: Db
  dir: string
  files: FileStore
  tasks: TaskStore
  close(): Promise<void>
}

/** 内存 SQLite + 临时目录 */
export async function createStores(): Promise<TestStores> {
  const db = openDb(':memory:')
  await initDb(db)
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stylize-test-'))
  return {
    db,
    dir,
    files: new FileStore(db, dir),
    tasks: new TaskStore(db),
    async close() {
      await closeDb(db)
      fs.rmSync(dir, { recursive: true, force: true })
    },
  }
}

export type Deferred<T> = {
  promise: Promise<T>
  resolve(value: T): void
  reject(error: unknown): void
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  let reject: (error: unknown) => void = () => undefined
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve: (v) => resolve(v), reject: (e) => reject(e) }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** 一直挂起，直到 signal 被触发才以 timeout 失败 */
export function hangUntilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    const fail = () => reject(new GenerationError('timeout', 'aborted'))
    if (signal.aborted) return fail()
    signal.addEventListener('abort', fail, { once: true })
  })
}

export function styledBytes(style: string): Buffer {
  return Buffer.from(`img:${style}`)
}

type GenerateBehavior = (req: GenerateRequest, attempt: number) => Promise<GeneratedImageBytes>

export class FakeGenerator implements ImageGenerator {
  readonly calls: string[] = []
  inFlight = 0
  maxInFlight = 0
  private readonly attempts = new Map<string, number>()

  constructor(
    private readonly behavior: GenerateBehavior = async (req) => ({
      bytes: styledBytes(req.style),
      contentType: 'image/png',
    }),
  ) {}

  async generate(req: GenerateRequest): Promise<GeneratedImageBytes> {
    const attempt = this.attempts.get(req.style) ?? 0
    this.attempts.set(req.style, attempt + 1)
    this.calls.push(req.style)
    this.inFlight += 1
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    try {
      return await this.behavior(req, attempt)
    } finally {
      this.inFlight -= 1
    }
  }
}

type ComposeBehavior = (req: ComposeRequest, onProgress: (percent: number) => void, signal: AbortSignal) => Promise<Buffer>

export class FakeComposer implements VideoComposer {
  readonly requests: ComposeRequest[] = []

  constructor(
    private readonly behavior: ComposeBehavior = async (_req, onProgress) => {
      onProgress(50)
      onProgress(100)
      return Buffer.from('video')
    },
  ) {}

  compose(req: ComposeRequest, onProgress: (percent: number) => void, signal: AbortSignal): Promise<Buffer> {
    this.requests.push(req)
    return this.behavior(req, onProgress, signal)
  }
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task-1',
    status: TASK_STATUS.QUEUED,
    progress: 0,
    version: 1,
    config: {
      styleCount: 1,
      styles: ['Watercolor'],
      width: 320,
      height: 240,
      fps: 10,
      slideSeconds: 2,
      transitionSeconds: 0.5,
      transition: 'fade',
      concurrency: 2,
      includeOriginal: false,
      autoSelect: false,
    },
    originalImageId: 'orig',
    images: [],
    selection: null,
    videoId: null,
    sourceTaskId: null,
    error: null,
    warning: null,
    createdAtMs: 1_000,
    updatedAtMs: 1_000,
    completedAtMs: null,
    ...overrides,
  }
}
