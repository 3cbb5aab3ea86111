import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { VideoQuality } from '../config.js'
import { InputError } from '../errors.js'
import { extractFramesFromVideo } from '../frames/extract.js'
import type { ProcessRunner } from '../process.js'
import type { Reporter } from '../run/reporter.js'

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4',
  '.avi',
  '.mov',
  '.mkv',
  '.wmv',
  '.flv',
  '.webm',
  '.m4v',
  '.3gp',
  '.ogv',
])

export const FRAMES_DIR_SUFFIX = '_frames'

export type ImageDirectory = {
  /** Absolute path of the image directory. */
  path: string
  name: string
  /** Working directory for every container invocation. */
  parent: string
}

export function isVideoFile(filePath: string): boolean {
  return VIDEO_EXTENSIONS.has(path.extname(filePath).toLowerCase())
}

export function resolveFramesDir(videoPath: string): string {
  const parsed = path.parse(path.resolve(videoPath))
  return path.join(parsed.dir, `${parsed.name}${FRAMES_DIR_SUFFIX}`)
}

export function describeImageDirectory(dir: string): ImageDirectory {
  const resolved = path.resolve(dir)
  return { path: resolved, name: path.basename(resolved), parent: path.dirname(resolved) }
}

export type InputKind = 'video' | 'directory' | 'other'

export async function classifyInput(inputPath: string): Promise<InputKind> {
  const stat = await fs.stat(inputPath).catch(() => null)
  if (stat?.isFile() && isVideoFile(inputPath)) return 'video'
  if (stat?.isDirectory()) return 'directory'
  return 'other'
}

/**
 * Turns the user-supplied input into the directory of images the pipeline runs on,
 * extracting frames first when the input is a video.
 */
export async function resolveImageDirectory({
  inputPath,
  fps,
  quality,
  forceExtract,
  ffmpegPath,
  reporter,
  runner,
  signal,
}: {
  inputPath: string
  fps: number
  quality: VideoQuality
  forceExtract: boolean
  ffmpegPath?: string
  reporter: Reporter
  runner?: ProcessRunner
  signal?: AbortSignal | null
}): Promise<ImageDirectory> {
  const resolved = path.resolve(inputPath)
  const kind = await classifyInput(resolved)

  if (kind === 'video') {
    reporter.info(`Input is a video file: ${path.basename(resolved)}`)
    const framesDir = resolveFramesDir(resolved)
    await extractFramesFromVideo({
      videoPath: resolved,
      outputDir: framesDir,
      fps,
      quality,
      forceExtract,
      ffmpegPath,
      reporter,
      runner,
      signal,
    })
    return describeImageDirectory(framesDir)
  }

  if (kind === 'directory') {
    reporter.info(`Input is a directory: ${path.basename(resolved)}`)
    return describeImageDirectory(resolved)
  }

  throw new InputError(`Input path '${resolved}' is neither a valid video file nor a directory`)
}
