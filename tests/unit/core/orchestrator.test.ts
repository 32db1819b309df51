import { AppError } from '../../../src/common/errors.js'
import { isGenerated, type Task } from '../../../src/common/types.js'
import { TaskOrchestrator, type OrchestratorSettings } from '../../../src/core/orchestrator.js'
import { GenerationError } from '../../../src/worker/generator.js'
import {
  createStores,
  deferred,
  delay,
  FakeComposer,
  FakeGenerator,
  hangUntilAborted,
  makeTask,
  PNG,
  styledBytes,
  type TestStores,
} from '../../helpers/fixtures.js'

const CATALOG = ['Ink', 'Pixel', 'Neon', 'Clay', 'Pop', 'Noir']

const SETTINGS: Partial<OrchestratorSettings> = {
  generationTimeoutMs: 5_000,
  composeTimeoutMs: 5_000,
  selectionTimeoutMs: 1_000,
  retryDelayMs: 0,
}

async function errorOf(promise: Promise<unknown>): Promise<AppError> {
  const err = await promise.catch((e: unknown) => e)
  if (!(err instanceof AppError)) throw new Error(`expected AppError, got ${String(err)}`)
  return err
}

function fileIds(task: Task): string[] {
  return task.images.filter(isGenerated).map((img) => img.fileId)
}

describe('TaskOrchestrator', () => {
  let stores: TestStores
  let originalId: string

  beforeEach(async () => {
    stores = await createStores()
    originalId = await stores.files.put(PNG, 'upload', 'image/png', { originalName: 'me.png' })
  })

  afterEach(async () => {
    await stores.close()
  })

  function orchestrator(
    generator = new FakeGenerator(),
    composer = new FakeComposer(),
    extra: { now?: () => number; settings?: Partial<OrchestratorSettings> } = {},
  ): TaskOrchestrator {
    return new TaskOrchestrator({
      tasks: stores.tasks,
      files: stores.files,
      generator,
      composer,
      styleCatalog: CATALOG,
      settings: { ...SETTINGS, ...extra.settings },
      now: extra.now,
    })
  }

  async function readyTask(orch: TaskOrchestrator, styles = ['Ink', 'Pixel', 'Neon']): Promise<Task> {
    const created = await orch.createTask({ originalImageId: originalId, styleCount: styles.length, styles })
    await orch.idle()
    return orch.get(created.id)
  }

  describe('createTask', () => {
    it('should persist a queued task with the chosen styles', async () => {
      const orch = orchestrator()

      const task = await orch.createTask(
        { originalImageId: originalId, styleCount: 2, styles: ['Ink'], width: 640, height: 480 },
        { start: false },
      )

      expect(task.status).toBe('queued')
      expect(task.version).toBe(1)
      expect(task.config.styles).toHaveLength(2)
      expect(task.config.styles[0]).toBe('Ink')
      expect(task.config).toMatchObject({ width: 640, height: 480, autoSelect: false, includeOriginal: false })
      expect(await stores.tasks.get(task.id)).toEqual(task)
    })

    it('should reject a missing original image', async () => {
      const err = await errorOf(orchestrator().createTask({ originalImageId: 'missing', styleCount: 1 }))

      expect(err.kind).toBe('not_found')
      expect(await stores.tasks.list()).toEqual([])
    })

    it('should reject an out-of-range style count', async () => {
      const err = await errorOf(orchestrator().createTask({ originalImageId: originalId, styleCount: 0 }))

      expect(err.kind).toBe('invalid_input')
    })

    it('should reject a transition that is not shorter than a slide', async () => {
      const err = await errorOf(
        orchestrator().createTask({
          originalImageId: originalId,
          styleCount: 1,
          slideSeconds: 1,
          transitionSeconds: 2,
          autoSelect: true,
        }),
      )

      expect(err.kind).toBe('invalid_input')
      expect(err.message).toBe('转场时长 2s 必须小于单张时长 1s')
      expect(await stores.tasks.list()).toEqual([])
    })

    it('should reject a transition name outside the allowed characters', async () => {
      const err = await errorOf(
        orchestrator().createTask({ originalImageId: originalId, styleCount: 1, transition: ['fade', 'x[0];movie=a'] }),
      )

      expect(err.kind).toBe('invalid_input')
      expect(await stores.tasks.list()).toEqual([])
    })
  })

  describe('generation phase', () => {
    it('should wait for a selection once every style is generated', async () => {
      const task = await readyTask(orchestrator())

      expect(task.status).toBe('awaiting_selection')
      expect(task.progress).toBe(40)
      expect(task.images.map((img) => img.style)).toEqual(['Ink', 'Pixel', 'Neon'])
      expect(fileIds(task)).toHaveLength(3)
      expect(task.warning).toBeNull()
      expect(task.error).toBeNull()
    })

    it('should carry on with a warning when some styles fail', async () => {
      const generator = new FakeGenerator(async (req) => {
        if (req.style === 'Pixel' || req.style === 'Clay') throw new GenerationError('upstream_error', 'model error')
        return { bytes: styledBytes(req.style), contentType: 'image/png' }
      })

      const task = await readyTask(orchestrator(generator), ['Ink', 'Pixel', 'Neon', 'Clay', 'Pop'])

      expect(task.status).toBe('awaiting_selection')
      expect(task.warning).toEqual({ kind: 'partial_generation', message: '2/5 个风格生成失败', failed: 2 })
      expect(fileIds(task)).toHaveLength(3)
      expect(task.images[1]).toEqual({ index: 1, style: 'Pixel', error: { kind: 'upstream_error', message: 'model error' } })
    })

    it('should fail with generation_exhausted when nothing succeeds', async () => {
      const generator = new FakeGenerator(async () => {
        throw new GenerationError('invalid_input', 'rejected')
      })

      const task = await readyTask(orchestrator(generator))

      expect(task.status).toBe('failed')
      expect(task.error).toEqual({ kind: 'generation_exhausted', message: '3 个风格全部生成失败' })
      expect(task.completedAtMs).not.toBeNull()
      expect(task.images).toHaveLength(3)
    })

    it('should fail with timeout when the phase budget runs out with no success', async () => {
      const generator = new FakeGenerator((req) => hangUntilAborted(req.signal))

      const task = await readyTask(orchestrator(generator, undefined, { settings: { generationTimeoutMs: 30 } }))

      expect(task.status).toBe('failed')
      expect(task.error?.kind).toBe('timeout')
    })

    it('should go straight to composition when auto-select is on', async () => {
      const composer = new FakeComposer()
      const orch = orchestrator(new FakeGenerator(), composer)

      const created = await orch.createTask({
        originalImageId: originalId,
        styleCount: 2,
        styles: ['Ink', 'Neon'],
        autoSelect: true,
      })
      await orch.idle()
      const task = await orch.get(created.id)

      expect(task.status).toBe('completed')
      expect(task.selection?.imageIds).toEqual(fileIds(task))
      expect(composer.requests[0].frames).toEqual([styledBytes('Ink'), styledBytes('Neon')])
    })

    it('should fail the task when the automatic selection is rejected', async () => {
      const composer = new FakeComposer()
      const orch = orchestrator(new FakeGenerator(), composer)

      const created = await orch.createTask({
        originalImageId: originalId,
        styleCount: 1,
        styles: ['Ink'],
        fps: 0,
        autoSelect: true,
      })
      await orch.idle()
      const task = await orch.get(created.id)

      expect(task.status).toBe('failed')
      expect(task.error).toEqual({ kind: 'invalid_input', message: '自动选择失败: 分辨率和帧率必须为正数' })
      expect(fileIds(task)).toHaveLength(1)
      expect(composer.requests).toEqual([])
    })
  })

  describe('submitSelection', () => {
    it('should compose the selected images in the given order', async () => {
      const composer = new FakeComposer()
      const orch = orchestrator(new FakeGenerator(), composer)
      const ready = await readyTask(orch)
      const [ink, , neon] = fileIds(ready)

      const composing = await orch.submitSelection(ready.id, { imageIds: [neon, ink] })
      expect(composing.status).toBe('composing')
      await orch.idle()
      const task = await orch.get(ready.id)

      expect(task.status).toBe('completed')
      expect(task.progress).toBe(100)
      expect(task.completedAtMs).not.toBeNull()
      expect(task.selection).toEqual({
        imageIds: [neon, ink],
        transition: 'fade',
        audioId: null,
        audioPolicy: 'silence',
        totalDurationS: null,
      })
      expect(composer.requests[0].frames).toEqual([styledBytes('Neon'), styledBytes('Ink')])
      expect(await stores.files.get(task.videoId ?? '')).toEqual(Buffer.from('video'))
    })

    it('should prepend the original when the task asks for it', async () => {
      const composer = new FakeComposer()
      const orch = orchestrator(new FakeGenerator(), composer)
      const created = await orch.createTask({
        originalImageId: originalId,
        styleCount: 1,
        styles: ['Ink'],
        includeOriginal: true,
      })
      await orch.idle()
      const ready = await orch.get(created.id)

      await orch.submitSelection(ready.id, { imageIds: fileIds(ready) })
      await orch.idle()

      expect(composer.requests[0].frames).toEqual([PNG, styledBytes('Ink')])
    })

    it.each([
      ['an empty selection', (_ids: string[]) => []],
      ['an id from outside the task', (_ids: string[]) => ['someone-else']],
      ['a duplicated id', (ids: string[]) => [ids[0], ids[0]]],
    ])('should reject %s and keep waiting', async (_name, pick) => {
      const orch = orchestrator()
      const ready = await readyTask(orch)

      const err = await errorOf(orch.submitSelection(ready.id, { imageIds: pick(fileIds(ready)) }))

      expect(err.kind).toBe('invalid_input')
      expect((await orch.get(ready.id)).status).toBe('awaiting_selection')
    })

    it('should pass a transition list through to the composer', async () => {
      const composer = new FakeComposer()
      const orch = orchestrator(new FakeGenerator(), composer)
      const ready = await readyTask(orch)

      await orch.submitSelection(ready.id, { imageIds: fileIds(ready), transition: ['slideleft', 'slideright'] })
      await orch.idle()

      expect((await orch.get(ready.id)).selection?.transition).toEqual(['slideleft', 'slideright'])
      expect(composer.requests[0].transitions).toEqual(['slideleft', 'slideright'])
    })

    it('should let only one of two concurrent selections through', async () => {
      const composer = new FakeComposer()
      const orch = orchestrator(new FakeGenerator(), composer)
      const ready = await readyTask(orch)
      const [ink, , neon] = fileIds(ready)

      const results = await Promise.allSettled([
        orch.submitSelection(ready.id, { imageIds: [ink] }),
        orch.submitSelection(ready.id, { imageIds: [neon] }),
      ])
      await orch.idle()

      const accepted = results.flatMap((r) => (r.status === 'fulfilled' ? [r.value] : []))
      const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []))
      expect(accepted).toHaveLength(1)
      expect(rejected).toHaveLength(1)
      expect(rejected[0]).toBeInstanceOf(AppError)
      expect(rejected[0]).toMatchObject({ kind: 'invalid_state' })

      const task = await orch.get(ready.id)
      expect(task.status).toBe('completed')
      expect(task.selection?.imageIds).toEqual(accepted[0].selection?.imageIds)
      expect(composer.requests).toHaveLength(1)
    })

    it('should reject a missing audio file', async () => {
      const orch = orchestrator()
      const ready = await readyTask(orch)

      const err = await errorOf(orch.submitSelection(ready.id, { imageIds: fileIds(ready), audioId: 'no-audio' }))

      expect(err.kind).toBe('not_found')
      expect((await orch.get(ready.id)).status).toBe('awaiting_selection')
    })

    it('should reject a selection outside awaiting_selection', async () => {
      const orch = orchestrator()
      const ready = await readyTask(orch)
      await orch.submitSelection(ready.id, { imageIds: fileIds(ready) })
      await orch.idle()

      const err = await errorOf(orch.submitSelection(ready.id, { imageIds: fileIds(ready) }))

      expect(err.kind).toBe('invalid_state')
    })

    it('should fail the task when composition fails and keep no video', async () => {
      const composer = new FakeComposer(async () => {
        throw new Error('encoder crashed')
      })
      const orch = orchestrator(new FakeGenerator(), composer)
      const ready = await readyTask(orch)

      await orch.submitSelection(ready.id, { imageIds: fileIds(ready) })
      await orch.idle()
      const task = await orch.get(ready.id)

      expect(task.status).toBe('failed')
      expect(task.error).toEqual({ kind: 'encode_error', message: 'encoder crashed' })
      expect(task.videoId).toBeNull()
      expect(await stores.files.list()).toHaveLength(4)
    })

    it('should pass the selected audio and keep its reference', async () => {
      const composer = new FakeComposer()
      const orch = orchestrator(new FakeGenerator(), composer)
      const ready = await readyTask(orch)
      const audioId = await stores.files.put(Buffer.from('mp3'), 'upload', 'audio/mpeg')

      await orch.submitSelection(ready.id, { imageIds: fileIds(ready), audioId, audioPolicy: 'loop' })
      await orch.idle()

      expect(composer.requests[0].audio).toEqual(Buffer.from('mp3'))
      expect(composer.requests[0].audioPolicy).toBe('loop')
      expect(await orch.sweepOrphans(0)).toBe(0)
    })
  })

  describe('progress', () => {
    it('should never decrease over the life of a task', async () => {
      const persisted: number[] = []
      const write = stores.tasks.compareAndSet.bind(stores.tasks)
      jest.spyOn(stores.tasks, 'compareAndSet').mockImplementation(async (next) => {
        const ok = await write(next)
        if (ok) persisted.push(next.progress)
        return ok
      })
      const generator = new FakeGenerator(async (req) => {
        await delay(req.style === 'Ink' ? 15 : 2)
        return { bytes: styledBytes(req.style), contentType: 'image/png' }
      })
      const composer = new FakeComposer(async (_req, onProgress) => {
        onProgress(30)
        onProgress(10)
        onProgress(80)
        return Buffer.from('video')
      })
      const orch = orchestrator(generator, composer)

      const ready = await readyTask(orch, ['Ink', 'Pixel', 'Neon', 'Clay'])
      await orch.submitSelection(ready.id, { imageIds: fileIds(ready) })
      await orch.idle()

      expect(persisted[persisted.length - 1]).toBe(100)
      expect(persisted).toEqual([...persisted].sort((a, b) => a - b))
      expect(persisted).toContain(40)
    })

    it('should stay monotonic when a retried style finishes after later styles', async () => {
      const persisted: number[] = []
      const write = stores.tasks.compareAndSet.bind(stores.tasks)
      jest.spyOn(stores.tasks, 'compareAndSet').mockImplementation(async (next) => {
        const ok = await write(next)
        if (ok) persisted.push(next.progress)
        return ok
      })
      const generator = new FakeGenerator(async (req, attempt) => {
        if (req.style === 'Ink' && attempt === 0) throw new GenerationError('rate_limited', 'slow down')
        await delay(2)
        return { bytes: styledBytes(req.style), contentType: 'image/png' }
      })
      const orch = orchestrator(generator, new FakeComposer(), { settings: { retryDelayMs: 20 } })

      const created = await orch.createTask({
        originalImageId: originalId,
        styleCount: 3,
        styles: ['Ink', 'Pixel', 'Neon'],
        concurrency: 3,
      })
      await orch.idle()
      const task = await orch.get(created.id)

      expect(generator.calls.filter((s) => s === 'Ink')).toHaveLength(2)
      expect(task.status).toBe('awaiting_selection')
      expect(task.images.map((img) => img.style)).toEqual(['Ink', 'Pixel', 'Neon'])
      expect(persisted).toEqual([0, 13, 27, 40, 40])
    })
  })

  describe('cancel', () => {
    it('should cancel during generation and drop late results', async () => {
      const started = deferred()
      const generator = new FakeGenerator((req) => {
        started.resolve()
        return hangUntilAborted(req.signal)
      })
      const orch = orchestrator(generator)
      const created = await orch.createTask({ originalImageId: originalId, styleCount: 2, styles: ['Ink', 'Neon'] })
      await started.promise

      const cancelled = await orch.cancel(created.id)
      await orch.idle()
      const task = await orch.get(created.id)

      expect(cancelled.status).toBe('cancelled')
      expect(task.status).toBe('cancelled')
      expect(task.images).toEqual([])
      expect(task.completedAtMs).not.toBeNull()
    })

    it('should abort generation when cancelled while the original is being read', async () => {
      const reading = deferred()
      const gate = deferred()
      const read = stores.files.get.bind(stores.files)
      jest.spyOn(stores.files, 'get').mockImplementationOnce(async (id) => {
        reading.resolve()
        await gate.promise
        return read(id)
      })
      const generator = new FakeGenerator()
      const orch = orchestrator(generator)

      const created = await orch.createTask({ originalImageId: originalId, styleCount: 2, styles: ['Ink', 'Neon'] })
      await reading.promise
      await orch.cancel(created.id)
      gate.resolve()
      await orch.idle()

      expect(generator.calls).toEqual([])
      expect((await orch.get(created.id)).status).toBe('cancelled')
      expect(await stores.files.list()).toHaveLength(1)
    })

    it('should not attach results when a cancel wins the race against generation finishing', async () => {
      const orch = orchestrator()
      const write = stores.tasks.compareAndSet.bind(stores.tasks)
      let raced = false
      jest.spyOn(stores.tasks, 'compareAndSet').mockImplementation(async (next) => {
        if (next.status === 'awaiting_selection' && !raced) {
          raced = true
          await orch.cancel(next.id)
        }
        return write(next)
      })

      const created = await orch.createTask({ originalImageId: originalId, styleCount: 2, styles: ['Ink', 'Neon'] })
      await orch.idle()
      const task = await orch.get(created.id)

      expect(raced).toBe(true)
      expect(task.status).toBe('cancelled')
      expect(task.images).toEqual([])
      expect(task.progress).toBe(40)
      expect(await errorOf(orch.submitSelection(created.id, { imageIds: ['any'] }))).toMatchObject({ kind: 'invalid_state' })
    })

    it('should cancel a task waiting for a selection', async () => {
      const orch = orchestrator()
      const ready = await readyTask(orch)

      await orch.cancel(ready.id)
      const err = await errorOf(orch.submitSelection(ready.id, { imageIds: fileIds(ready) }))

      expect(err.kind).toBe('invalid_state')
      // 已生成的文件不随取消删除
      for (const id of fileIds(ready)) expect(await stores.files.exists(id)).toBe(true)
    })

    it('should refuse to cancel a finished task', async () => {
      const orch = orchestrator()
      const ready = await readyTask(orch)
      await orch.cancel(ready.id)

      const err = await errorOf(orch.cancel(ready.id))

      expect(err.kind).toBe('invalid_state')
    })
  })

  describe('regenerate', () => {
    async function completedTask(orch: TaskOrchestrator): Promise<Task> {
      const ready = await readyTask(orch)
      await orch.submitSelection(ready.id, { imageIds: fileIds(ready) })
      await orch.idle()
      return orch.get(ready.id)
    }

    it('should reuse the source images in a new task', async () => {
      const orch = orchestrator()
      const source = await completedTask(orch)

      const task = await orch.regenerate(source.id)

      expect(task.id).not.toBe(source.id)
      expect(task.status).toBe('awaiting_selection')
      expect(task.sourceTaskId).toBe(source.id)
      expect(task.progress).toBe(40)
      expect(task.originalImageId).toBe(source.originalImageId)
      expect(fileIds(task)).toEqual(fileIds(source))
      expect(task.videoId).toBeNull()
    })

    it('should keep shared files when the source task is deleted', async () => {
      const orch = orchestrator()
      const source = await completedTask(orch)
      const copy = await orch.regenerate(source.id)

      const report = await orch.deleteTask(source.id)

      expect(report.deleted).toEqual([source.videoId])
      expect(report.protected).toEqual([originalId, ...fileIds(source)])
      for (const id of [originalId, ...fileIds(copy)]) expect(await stores.files.exists(id)).toBe(true)

      await orch.submitSelection(copy.id, { imageIds: fileIds(copy).slice(0, 2) })
      await orch.idle()
      expect((await orch.get(copy.id)).status).toBe('completed')
    })

    it('should start composition right away when a selection is given', async () => {
      const orch = orchestrator()
      const source = await completedTask(orch)

      const task = await orch.regenerate(source.id, { imageIds: fileIds(source).slice(1) }, { slideSeconds: 2 })
      expect(task.status).toBe('composing')
      await orch.idle()

      const done = await orch.get(task.id)
      expect(done.status).toBe('completed')
      expect(done.config.slideSeconds).toBe(2)
      expect(done.videoId).not.toBe(source.videoId)
    })

    it('should not leave a task behind when the selection is rejected', async () => {
      const orch = orchestrator()
      const source = await completedTask(orch)
      const before = await stores.tasks.list()

      const err = await errorOf(orch.regenerate(source.id, { imageIds: ['someone-else'] }))

      expect(err.kind).toBe('invalid_input')
      expect(await stores.tasks.list()).toEqual(before)
    })

    it('should reject overrides that make the transition too long', async () => {
      const orch = orchestrator()
      const source = await completedTask(orch)

      const err = await errorOf(orch.regenerate(source.id, undefined, { slideSeconds: 1, transitionSeconds: 1 }))

      expect(err.kind).toBe('invalid_input')
      expect(await stores.tasks.list()).toHaveLength(1)
    })

    it('should refuse a source without generated images', async () => {
      const orch = orchestrator(
        new FakeGenerator(async () => {
          throw new GenerationError('invalid_input', 'rejected')
        }),
      )
      const failed = await readyTask(orch)

      const err = await errorOf(orch.regenerate(failed.id))

      expect(err.kind).toBe('invalid_state')
    })
  })

  describe('deleteTask', () => {
    it('should refuse to delete a task that is composing', async () => {
      const release = deferred<Buffer>()
      const orch = orchestrator(new FakeGenerator(), new FakeComposer(() => release.promise))
      const ready = await readyTask(orch)
      await orch.submitSelection(ready.id, { imageIds: fileIds(ready) })

      const err = await errorOf(orch.deleteTask(ready.id))
      release.resolve(Buffer.from('video'))
      await orch.idle()

      expect(err.kind).toBe('invalid_state')
      expect((await orch.get(ready.id)).status).toBe('completed')
    })

    it('should report not_found for an unknown task', async () => {
      const err = await errorOf(orchestrator().deleteTask('nope'))

      expect(err.kind).toBe('not_found')
    })
  })

  describe('failStale', () => {
    it('should time out tasks that wait too long for a selection', async () => {
      let clock = 1_000_000
      const orch = orchestrator(new FakeGenerator(), new FakeComposer(), { now: () => clock })
      const ready = await readyTask(orch)

      expect(await orch.failStale()).toBe(0)
      clock += 1_001
      expect(await orch.failStale()).toBe(1)

      expect(await orch.get(ready.id)).toMatchObject({ status: 'failed', error: { kind: 'timeout' } })
    })
  })

  describe('recover', () => {
    it('should resume queued tasks and interrupt the ones that were running', async () => {
      await stores.tasks.insert(makeTask({ id: 'q', originalImageId: originalId, config: { ...makeTask().config, styles: ['Ink'] } }))
      await stores.tasks.insert(makeTask({ id: 'g', status: 'generating', originalImageId: originalId }))
      await stores.tasks.insert(makeTask({ id: 'c', status: 'composing', originalImageId: originalId }))
      const orch = orchestrator()

      const summary = await orch.recover()
      await orch.idle()

      expect(summary).toEqual({ resumed: 1, interrupted: 2 })
      expect((await orch.get('q')).status).toBe('awaiting_selection')
      expect(await orch.get('g')).toMatchObject({ status: 'failed', error: { kind: 'interrupted' } })
      expect(await orch.get('c')).toMatchObject({ status: 'failed', error: { kind: 'interrupted' } })
    })
  })
})
