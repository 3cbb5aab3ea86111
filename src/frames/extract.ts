import { type Dirent, promises as fs } from 'node:fs'
import path from 'node:path'

import type { VideoQuality } from '../config.js'
import { ArtifactError, ProcessError, ReconstructError } from '../errors.js'
import { isFileEntry } from '../input/validate.js'
import { formatCommand, type ProcessRunner, runProcess } from '../process.js'
import type { Reporter } from '../run/reporter.js'
import { formatSeconds } from '../run/terminal.js'

export const FRAME_FILENAME_PATTERN = 'frame_%06d.jpg'

// ffmpeg -q:v scale: lower is better.
export const QUALITY_SCALE: Record<VideoQuality, string> = {
  high: '2',
  medium: '5',
  low: '10',
}

export const MIN_RECOMMENDED_FPS = 1.0
export const MAX_RECOMMENDED_FPS = 5.0
export const MIN_RECOMMENDED_FRAMES = 20
export const MAX_RECOMMENDED_FRAMES = 500

export const FFMPEG_INSTALL_HINTS = [
  'Please install ffmpeg:',
  '  Ubuntu/Debian: sudo apt install ffmpeg',
  '  macOS: brew install ffmpeg',
  '  Windows: Download from https://ffmpeg.org/',
]

export type FpsAdvice = 'low' | 'high' | null
export type FrameCountAdvice = 'low' | 'high' | null

export function adviseFps(fps: number): FpsAdvice {
  if (fps < MIN_RECOMMENDED_FPS) return 'low'
  if (fps > MAX_RECOMMENDED_FPS) return 'high'
  return null
}

export function adviseFrameCount(count: number): FrameCountAdvice {
  if (count < MIN_RECOMMENDED_FRAMES) return 'low'
  if (count > MAX_RECOMMENDED_FRAMES) return 'high'
  return null
}

export function buildFfmpegArgs({
  videoPath,
  outputDir,
  fps,
  quality,
}: {
  videoPath: string
  outputDir: string
  fps: number
  quality: VideoQuality
}): string[] {
  return [
    '-i',
    videoPath,
    '-vf',
    `fps=${fps}`,
    '-q:v',
    QUALITY_SCALE[quality],
    '-y',
    path.join(outputDir, FRAME_FILENAME_PATTERN),
  ]
}

async function listFiles(dir: string, extensions: string[]): Promise<string[]> {
  let entries: Dirent[]
  try {
    entries = await fs.readdir(dir, { withFileTypes: true })
  } catch {
    return []
  }
  const files: string[] = []
  for (const entry of entries) {
    if (!extensions.includes(path.extname(entry.name))) continue
    if (await isFileEntry(dir, entry)) files.push(path.join(dir, entry.name))
  }
  return files
}

export async function listExistingFrames(dir: string): Promise<string[]> {
  return await listFiles(dir, ['.jpg', '.png'])
}

export type FrameExtractionResult = {
  frameCount: number
  /** True when existing frames were reused and ffmpeg did not run. */
  reused: boolean
}

export async function extractFramesFromVideo({
  videoPath,
  outputDir,
  fps,
  quality,
  forceExtract = false,
  ffmpegPath = 'ffmpeg',
  reporter,
  runner = runProcess,
  signal,
}: {
  videoPath: string
  outputDir: string
  fps: number
  quality: VideoQuality
  forceExtract?: boolean
  ffmpegPath?: string
  reporter: Reporter
  runner?: ProcessRunner
  signal?: AbortSignal | null
}): Promise<FrameExtractionResult> {
  if (!forceExtract) {
    const existing = await listExistingFrames(outputDir)
    if (existing.length > 0) {
      reporter.success(`Found ${existing.length} existing images in ${outputDir}`)
      reporter.info('Skipping frame extraction. Use --force-extract to re-extract frames.')
      return { frameCount: existing.length, reused: true }
    }
  }

  await fs.mkdir(outputDir, { recursive: true })

  const args = buildFfmpegArgs({ videoPath, outputDir, fps, quality })

  reporter.step(`Extracting frames from video: ${path.basename(videoPath)}`)
  reporter.info(`Output directory: ${outputDir}`)
  reporter.info(`Frame rate: ${fps} fps, Quality: ${quality}`)

  const fpsAdvice = adviseFps(fps)
  if (fpsAdvice === 'low') {
    reporter.warning(`Low frame rate (${fps} fps) - may result in poor 3D reconstruction`)
    reporter.info('Recommendation: Use 1.5-3.0 fps for better results')
  } else if (fpsAdvice === 'high') {
    reporter.warning(`High frame rate (${fps} fps) - will create many frames and slow processing`)
    reporter.info('Recommendation: Use 1.5-3.0 fps unless you need high temporal resolution')
  }

  reporter.debug(`FFmpeg command: ${formatCommand(ffmpegPath, args)}`)

  const startedAt = Date.now()
  try {
    await runner({
      command: ffmpegPath,
      args,
      label: 'ffmpeg',
      installHints: FFMPEG_INSTALL_HINTS,
      passthrough: reporter.verbose ? { stdout: reporter.stdout, stderr: reporter.stderr } : null,
      signal,
    })
  } catch (error) {
    if (error instanceof ProcessError) {
      const details = [
        'Failed to extract frames from video',
        `Return code: ${error.exitCode ?? 'null'}`,
      ]
      if (error.stderr.trim()) details.push(`FFmpeg error: ${error.stderr.trim()}`)
      throw new ReconstructError(
        'process',
        `Frame extraction failed after ${formatSeconds(Date.now() - startedAt)}`,
        details
      )
    }
    throw error
  }
  const elapsedMs = Date.now() - startedAt

  const frames = await listFiles(outputDir, ['.jpg'])
  if (frames.length === 0) {
    throw new ArtifactError('No frames were extracted from the video')
  }
  reporter.success(`Extracted ${frames.length} frames in ${formatSeconds(elapsedMs)}`)

  const countAdvice = adviseFrameCount(frames.length)
  if (countAdvice === 'low') {
    reporter.warning('Very few frames extracted - may not be sufficient for 3D reconstruction')
    reporter.info('Consider increasing --fps or using a longer video')
  } else if (countAdvice === 'high') {
    reporter.warning(`Many frames extracted (${frames.length}) - processing will be slow`)
    reporter.info('Consider reducing --fps for faster processing')
  }

  return { frameCount: frames.length, reused: false }
}
