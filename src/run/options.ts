import yargs from 'yargs'

import {
  DEFAULT_DOCKER_IMAGE,
  DEFAULT_FPS,
  DEFAULT_MAX_IMAGE_SIZE,
  DEFAULT_VIDEO_QUALITY,
  isVideoQuality,
  type ReconstructConfig,
  VIDEO_QUALITIES,
  type VideoQuality,
} from '../config.js'
import { ValidationError } from '../errors.js'
import { STEP_COUNT } from '../pipeline/steps.js'

export type RunConfiguration = Readonly<{
  inputPath: string
  dockerImage: string
  dockerPath: string
  ffmpegPath: string
  maxImageSize: number
  skipDense: boolean
  skipMesh: boolean
  verbose: boolean
  fps: number
  videoQuality: VideoQuality
  forceExtract: boolean
  clean: boolean
  cleanOnly: boolean
  gpus: boolean
  /** Single step to run; null means the start/stop range applies. */
  step: number | null
  startFrom: number
  stopAt: number
}>

export type ParsedCli =
  | { kind: 'help'; text: string }
  | { kind: 'version' }
  | { kind: 'run'; config: RunConfiguration }

const USAGE = `$0 <input> [options]

Run the COLMAP reconstruction pipeline on a directory of images,
or extract frames from a video first.

  <input>  Directory containing images OR path to a video file

Steps:
  1 Feature Extraction      5 Patch Match Stereo
  2 Feature Matching        6 Stereo Fusion
  3 Sparse Reconstruction   7 Poisson Meshing
  4 Image Undistortion`

function buildParser(argv: string[], config: ReconstructConfig | null) {
  // help/version are redefined below as plain flags; disabling them first keeps
  // yargs from printing or exiting on its own.
  return yargs(argv)
    .scriptName('reconstruct')
    .help(false)
    .version(false)
    .usage(USAGE)
    .parserConfiguration({ 'parse-positional-numbers': false })
    .option('docker-image', {
      type: 'string',
      describe: `Docker image to use (default: ${DEFAULT_DOCKER_IMAGE})`,
    })
    .option('max-image-size', {
      type: 'number',
      describe: `Maximum image size for processing (default: ${DEFAULT_MAX_IMAGE_SIZE})`,
    })
    .option('skip-dense', {
      type: 'boolean',
      describe: 'Skip dense reconstruction (only run sparse reconstruction)',
    })
    .option('skip-mesh', {
      type: 'boolean',
      describe: 'Skip mesh generation (run up to dense point cloud)',
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      describe: 'Show commands and stream output from docker and ffmpeg',
    })
    .option('fps', {
      type: 'number',
      describe: `Frames per second to extract from video (default: ${DEFAULT_FPS})`,
    })
    .option('video-quality', {
      type: 'string',
      choices: VIDEO_QUALITIES,
      describe: `Quality of extracted frames (default: ${DEFAULT_VIDEO_QUALITY})`,
    })
    .option('force-extract', {
      type: 'boolean',
      describe: 'Force re-extraction of frames even if images already exist',
    })
    .option('clean', {
      type: 'boolean',
      describe: 'Clean all generated files before processing (database, sparse, dense, frames)',
    })
    .option('clean-only', {
      type: 'boolean',
      describe: 'Only clean generated files and exit (no processing)',
    })
    .option('step', { type: 'number', describe: `Run only a specific step (1-${STEP_COUNT})` })
    .option('start-from', {
      type: 'number',
      describe: `Start processing from a specific step (1-${STEP_COUNT}, default: 1)`,
    })
    .option('stop-at', {
      type: 'number',
      describe: `Stop processing at a specific step (1-${STEP_COUNT}, default: ${STEP_COUNT})`,
    })
    .option('gpu', {
      type: 'boolean',
      default: config?.gpus ?? true,
      describe: 'Pass --gpus all to docker (disable with --no-gpu)',
    })
    .option('help', { alias: 'h', type: 'boolean', describe: 'Show help' })
    .option('version', { alias: 'V', type: 'boolean', describe: 'Show version number' })
    .strictOptions()
    .exitProcess(false)
    .wrap(null)
    .fail((message, error) => {
      const detail = message || (error instanceof Error ? error.message : '')
      throw new ValidationError(detail || 'Invalid arguments')
    })
}

function readStepNumber(name: string, value: number | undefined): number | null {
  if (value === undefined) return null
  if (!Number.isInteger(value) || value < 1 || value > STEP_COUNT) {
    throw new ValidationError(`--${name} must be an integer between 1 and ${STEP_COUNT}`)
  }
  return value
}

/**
 * Checks the step selection flags. `startFrom` / `stopAt` are null when not given
 * on the command line; `--step` only conflicts with a range that narrows 1-7.
 */
export function resolveStepRange({
  step,
  startFrom,
  stopAt,
}: {
  step: number | null
  startFrom: number | null
  stopAt: number | null
}): { step: number | null; startFrom: number; stopAt: number } {
  const start = startFrom ?? 1
  const stop = stopAt ?? STEP_COUNT
  if (step !== null && (start !== 1 || stop !== STEP_COUNT)) {
    throw new ValidationError('Cannot use --step with --start-from or --stop-at')
  }
  if (start > stop) {
    throw new ValidationError('--start-from cannot be greater than --stop-at')
  }
  return { step, startFrom: start, stopAt: stop }
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim()
    if (trimmed) return trimmed
  }
  return undefined
}

export function parseCliArgs({
  argv,
  env,
  config,
}: {
  argv: string[]
  env: Record<string, string | undefined>
  config: ReconstructConfig | null
}): ParsedCli {
  const parser = buildParser(argv, config)
  const parsed = parser.parseSync()

  if (parsed.help) {
    let text = ''
    parser.showHelp((output) => {
      text = output
    })
    return { kind: 'help', text }
  }
  if (parsed.version) return { kind: 'version' }

  const positionals = parsed._.map(String)
  if (positionals.length === 0) {
    throw new ValidationError('Missing input path (video file or image directory)')
  }
  if (positionals.length > 1) {
    throw new ValidationError(`Expected a single input path, got ${positionals.length}`)
  }

  const range = resolveStepRange({
    step: readStepNumber('step', parsed.step),
    startFrom: readStepNumber('start-from', parsed['start-from']),
    stopAt: readStepNumber('stop-at', parsed['stop-at']),
  })

  const fps = parsed.fps ?? config?.fps ?? DEFAULT_FPS
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new ValidationError('--fps must be a positive number')
  }

  const maxImageSize = parsed['max-image-size'] ?? config?.maxImageSize ?? DEFAULT_MAX_IMAGE_SIZE
  if (!Number.isInteger(maxImageSize) || maxImageSize <= 0) {
    throw new ValidationError('--max-image-size must be a positive integer')
  }

  const qualityFlag = parsed['video-quality']
  const videoQuality = isVideoQuality(qualityFlag)
    ? qualityFlag
    : (config?.videoQuality ?? DEFAULT_VIDEO_QUALITY)

  const runConfig: RunConfiguration = {
    inputPath: positionals[0] ?? '',
    dockerImage:
      firstNonEmpty(parsed['docker-image'], env.RECONSTRUCT_DOCKER_IMAGE, config?.dockerImage) ??
      DEFAULT_DOCKER_IMAGE,
    dockerPath: firstNonEmpty(env.RECONSTRUCT_DOCKER_PATH, config?.dockerPath) ?? 'docker',
    ffmpegPath: firstNonEmpty(env.FFMPEG_PATH, config?.ffmpegPath) ?? 'ffmpeg',
    maxImageSize,
    skipDense: parsed['skip-dense'] ?? false,
    skipMesh: parsed['skip-mesh'] ?? false,
    verbose: parsed.verbose ?? false,
    fps,
    videoQuality,
    forceExtract: parsed['force-extract'] ?? false,
    clean: parsed.clean ?? false,
    cleanOnly: parsed['clean-only'] ?? false,
    gpus: parsed.gpu,
    ...range,
  }
  return { kind: 'run', config: Object.freeze(runConfig) }
}
