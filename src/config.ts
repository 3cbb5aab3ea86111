import { readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'

import { ConfigError } from './errors.js'

export type VideoQuality = 'high' | 'medium' | 'low'

export const VIDEO_QUALITIES: readonly VideoQuality[] = ['high', 'medium', 'low']

export type ReconstructConfig = {
  /** Container image with the `colmap` binary, e.g. roboticsmicrofarms/colmap:3.8 */
  dockerImage?: string
  maxImageSize?: number
  fps?: number
  videoQuality?: VideoQuality
  /** Pass `--gpus all` to docker. */
  gpus?: boolean
  dockerPath?: string
  ffmpegPath?: string
}

export const DEFAULT_DOCKER_IMAGE = 'roboticsmicrofarms/colmap:3.8'
export const DEFAULT_MAX_IMAGE_SIZE = 2000
export const DEFAULT_FPS = 2.0
export const DEFAULT_VIDEO_QUALITY: VideoQuality = 'medium'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isVideoQuality(value: unknown): value is VideoQuality {
  return VIDEO_QUALITIES.some((quality) => quality === value)
}

function readString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  return trimmed ? trimmed : undefined
}

function readPositiveNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined
}

export function resolveConfigPath(env: Record<string, string | undefined>): string | null {
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || homedir()
  if (!home) return null
  return join(home, '.reconstruct', 'config.json')
}

export function loadReconstructConfig({ env }: { env: Record<string, string | undefined> }): {
  config: ReconstructConfig | null
  path: string | null
} {
  const path = resolveConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Invalid config file ${path}: expected an object at the top level`)
  }

  const maxImageSize = readPositiveNumber(parsed.maxImageSize)
  return {
    config: {
      dockerImage: readString(parsed.dockerImage),
      maxImageSize:
        maxImageSize !== undefined && Number.isInteger(maxImageSize) ? maxImageSize : undefined,
      fps: readPositiveNumber(parsed.fps),
      videoQuality: isVideoQuality(parsed.videoQuality) ? parsed.videoQuality : undefined,
      gpus: typeof parsed.gpus === 'boolean' ? parsed.gpus : undefined,
      dockerPath: readString(parsed.dockerPath),
      ffmpegPath: readString(parsed.ffmpegPath),
    },
    path,
  }
}
