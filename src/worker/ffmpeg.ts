import { spawn } from 'node:child_process'
import path from 'node:path'
import fs from 'node:fs'
import { nanoid } from 'nanoid'
import { CONFIG } from '../common/config.js'
import { errorMessage } from '../common/errors.js'
import { CompositionError, normalizeTransitions, type ComposeRequest, type VideoComposer } from './composition.js'

type RunOptions = {
  onStdoutLine?: (line: string) => void
  signal?: AbortSignal
}

function run(cmd: string, args: string[], opts: RunOptions = {}): Promise<{ code: number; stderr: string }> {
  return new Promise((resolve, reject) => {
    // 如果命令是 ffmpeg，使用配置的路径
    const actualCmd = cmd === 'ffmpeg' ? CONFIG.FFMPEG_PATH : cmd
    const p = spawn(actualCmd, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    let stderr = ''
    let pending = ''
    p.stdout.on('data', (d: Buffer) => {
      pending += d.toString()
      const lines = pending.split('\n')
      pending = lines.pop() ?? ''
      for (const line of lines) opts.onStdoutLine?.(line.trim())
    })
    p.stderr.on('data', (d: Buffer) => {
      stderr += d.toString()
    })
    const kill = () => p.kill('SIGKILL')
    opts.signal?.addEventListener('abort', kill, { once: true })
    p.on('error', (err) => {
      opts.signal?.removeEventListener('abort', kill)
      // 提供更友好的错误信息
      if (err.message && err.message.includes('ENOENT')) {
        reject(new Error(`找不到 FFmpeg 可执行文件。请确保 FFmpeg 已安装并在 PATH 中，或设置环境变量 FFMPEG_PATH 指向 FFmpeg 的完整路径。当前配置: ${CONFIG.FFMPEG_PATH}`))
      } else {
        reject(err)
      }
    })
    p.on('close', (code) => {
      opts.signal?.removeEventListener('abort', kill)
      resolve({ code: code ?? 0, stderr })
    })
  })
}

/**
 * 根据文件头猜扩展名，image2 demuxer 按扩展名选解码器
 */
export function imageExt(bytes: Buffer): string {
  if (bytes.length >= 4 && bytes[0] === 0x89 && bytes.toString('latin1', 1, 4) === 'PNG') return '.png'
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xd8) return '.jpg'
  if (bytes.length >= 12 && bytes.toString('latin1', 0, 4) === 'RIFF' && bytes.toString('latin1', 8, 12) === 'WEBP') return '.webp'
  if (bytes.length >= 3 && bytes.toString('latin1', 0, 3) === 'GIF') return '.gif'
  if (bytes.length >= 2 && bytes.toString('latin1', 0, 2) === 'BM') return '.bmp'
  return '.png'
}

function fmt(seconds: number): string {
  return String(Math.round(seconds * 1000) / 1000)
}

export type ComposeArgsInput = Omit<ComposeRequest, 'frames' | 'audio'> & {
  framePaths: string[]
  audioPath: string | null
  outputPath: string
}

/**
 * 拼 ffmpeg 参数：每张图一个 -loop 1 输入，统一缩放补边后用 xfade 串起来，转场列表按边界循环；
 * 音频默认 apad 补静音，loop 策略用 -stream_loop -1 循环；最后统一 -t 截到画面总时长。
 */
export function buildComposeArgs(input: ComposeArgsInput): string[] {
  const { width: w, height: h, fps } = input
  const n = input.framePaths.length
  const transitions = normalizeTransitions(input.transitions)
  const args: string[] = ['-hide_banner', '-y']

  input.framePaths.forEach((p, i) => {
    args.push('-loop', '1', '-framerate', String(fps), '-t', fmt(input.durations[i]), '-i', p)
  })
  if (input.audioPath) {
    if (input.audioPolicy === 'loop') args.push('-stream_loop', '-1')
    args.push('-i', input.audioPath)
  }

  const filters: string[] = []
  for (let i = 0; i < n; i++) {
    filters.push(
      `[${i}:v]scale=${w}:${h}:force_original_aspect_ratio=decrease,pad=${w}:${h}:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=${fps},format=yuv420p[f${i}]`,
    )
  }
  if (n === 1) {
    filters.push(`[f0]null[vout]`)
  } else {
    let prev = 'f0'
    let elapsed = 0
    for (let k = 1; k < n; k++) {
      elapsed += input.durations[k - 1]
      const offset = elapsed - k * input.transitionSeconds
      const out = k === n - 1 ? 'vout' : `x${k}`
      filters.push(
        `[${prev}][f${k}]xfade=transition=${transitions[(k - 1) % transitions.length]}:duration=${fmt(input.transitionSeconds)}:offset=${fmt(offset)}[${out}]`,
      )
      prev = out
    }
  }
  if (input.audioPath && input.audioPolicy === 'silence') {
    filters.push(`[${n}:a]apad[aout]`)
  }

  args.push('-filter_complex', filters.join(';'), '-map', '[vout]')
  if (input.audioPath) {
    args.push('-map', input.audioPolicy === 'silence' ? '[aout]' : `${n}:a`, '-c:a', 'aac', '-b:a', CONFIG.AUDIO_BITRATE)
  }
  args.push(
    '-c:v',
    'libx264',
    '-pix_fmt',
    'yuv420p',
    '-r',
    String(fps),
    '-b:v',
    CONFIG.VIDEO_BITRATE,
    '-preset',
    'medium',
    '-t',
    fmt(input.totalSeconds),
    '-movflags',
    '+faststart',
    '-progress',
    'pipe:1',
    '-nostats',
    input.outputPath,
  )
  return args
}

/**
 * 解析 -progress 输出，返回 0-100；不是进度行时返回 null
 */
export function parseProgressLine(line: string, totalSeconds: number): number | null {
  if (line === 'progress=end') return 100
  const m = /^out_time_(?:us|ms)=(\d+)$/.exec(line)
  if (!m || totalSeconds <= 0) return null
  const seconds = Number(m[1]) / 1_000_000
  return Math.min(99, Math.round((seconds / totalSeconds) * 100))
}

/**
 * 用本机 ffmpeg 合成视频。每次合成使用独立的临时目录，结束后删除。
 */
export class FfmpegVideoComposer implements VideoComposer {
  constructor(private readonly tmpDir: string = path.join(CONFIG.DATA_DIR, 'tmp')) {}

  async compose(req: ComposeRequest, onProgress: (percent: number) => void, signal: AbortSignal): Promise<Buffer> {
    const workDir = path.join(this.tmpDir, `compose_${nanoid()}`)
    await fs.promises.mkdir(workDir, { recursive: true })
    try {
      const framePaths: string[] = []
      for (let i = 0; i < req.frames.length; i++) {
        const p = path.join(workDir, `frame_${String(i).padStart(3, '0')}${imageExt(req.frames[i])}`)
        await fs.promises.writeFile(p, req.frames[i])
        framePaths.push(p)
      }
      let audioPath: string | null = null
      if (req.audio) {
        audioPath = path.join(workDir, 'audio')
        await fs.promises.writeFile(audioPath, req.audio)
      }
      const outputPath = path.join(workDir, 'output.mp4')

      const args = buildComposeArgs({
        framePaths,
        audioPath,
        outputPath,
        durations: req.durations,
        transitions: req.transitions,
        transitionSeconds: req.transitionSeconds,
        totalSeconds: req.totalSeconds,
        audioPolicy: req.audioPolicy,
        width: req.width,
        height: req.height,
        fps: req.fps,
      })
      console.log('[FFmpeg] compose args:', args.join(' '))

      let result: { code: number; stderr: string }
      try {
        result = await run('ffmpeg', args, {
          signal,
          onStdoutLine: (line) => {
            const p = parseProgressLine(line, req.totalSeconds)
            if (p !== null) onProgress(p)
          },
        })
      } catch (e) {
        throw new CompositionError('encode_error', errorMessage(e))
      }
      if (signal.aborted) throw new CompositionError('timeout', 'ffmpeg 合成被中止')
      if (result.code !== 0) {
        throw new CompositionError('encode_error', `ffmpeg 合成失败：${result.stderr.slice(-800)}`)
      }
      return await fs.promises.readFile(outputPath)
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true })
    }
  }
}
