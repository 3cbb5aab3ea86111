import { promises as fs } from 'node:fs'
import path from 'node:path'

import { cleanGeneratedFiles } from './clean.js'
import { loadReconstructConfig } from './config.js'
import { InputError, throwIfAborted } from './errors.js'
import { resolveImageDirectory } from './input/resolve.js'
import { checkImageDirectory } from './input/validate.js'
import { reportPipelineSummary, runPipeline } from './pipeline/executor.js'
import { reportPipelineStatus } from './pipeline/status.js'
import { PIPELINE_STEPS, selectSteps, STEP_COUNT } from './pipeline/steps.js'
import type { StepSelection } from './pipeline/types.js'
import type { ProcessRunner } from './process.js'
import { parseCliArgs, type RunConfiguration } from './run/options.js'
import { createReporter, type Reporter } from './run/reporter.js'
import { isRichTty } from './run/terminal.js'
import { resolvePackageVersion } from './version.js'

export type CliContext = {
  env: Record<string, string | undefined>
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  /** Replaces the spawn-based runner (tests). */
  runner?: ProcessRunner
  signal?: AbortSignal | null
}

async function cleanBeforeRun(config: RunConfiguration, reporter: Reporter): Promise<void> {
  reporter.step('Cleaning generated files...')
  const cleaned = await cleanGeneratedFiles({ inputPath: config.inputPath, reporter })
  if (cleaned.length > 0) {
    reporter.success('Clean completed')
  } else {
    reporter.info('No files to clean')
  }
}

function describeSelection(config: RunConfiguration, reporter: Reporter): void {
  if (config.step !== null) {
    reporter.info(`Running only step ${config.step}/${STEP_COUNT}`)
  } else if (config.startFrom > 1 || config.stopAt < STEP_COUNT) {
    reporter.info(`Running steps ${config.startFrom}-${config.stopAt}`)
  }

  if (config.skipDense) {
    reporter.warning('Dense reconstruction will be skipped')
  } else if (config.skipMesh) {
    reporter.warning('Mesh generation will be skipped')
  }
}

/**
 * Parses `argv` and runs one pipeline invocation. Errors are thrown, not printed;
 * `runCliMain` turns them into messages and exit codes.
 */
export async function runCli(argv: string[], context: CliContext): Promise<void> {
  const { env, stdout, stderr, runner, signal } = context
  const { config: fileConfig } = loadReconstructConfig({ env })
  const parsed = parseCliArgs({ argv, env, config: fileConfig })

  if (parsed.kind === 'help') {
    stdout.write(`${parsed.text}\n`)
    return
  }
  if (parsed.kind === 'version') {
    stdout.write(`${resolvePackageVersion()}\n`)
    return
  }

  const config = parsed.config
  throwIfAborted(signal)
  const reporter = createReporter({ stdout, stderr, env, verbose: config.verbose })

  const inputPath = path.resolve(config.inputPath)
  if (!(await fs.stat(inputPath).catch(() => null))) {
    throw new InputError(`Input path '${inputPath}' does not exist`)
  }

  if (config.clean || config.cleanOnly) {
    await cleanBeforeRun(config, reporter)
    throwIfAborted(signal)
    if (config.cleanOnly) {
      reporter.info('Clean-only mode: exiting after cleanup')
      return
    }
  }

  const imageDir = await resolveImageDirectory({
    inputPath,
    fps: config.fps,
    quality: config.videoQuality,
    forceExtract: config.forceExtract,
    ffmpegPath: config.ffmpegPath,
    reporter,
    runner,
    signal,
  })
  throwIfAborted(signal)
  await checkImageDirectory(imageDir.path, reporter)
  throwIfAborted(signal)

  const target = { workDir: imageDir.parent, imageDirName: imageDir.name }
  if (config.verbose || config.step !== null || config.startFrom > 1) {
    await reportPipelineStatus(target, reporter)
    throwIfAborted(signal)
    reporter.plain()
  }

  reporter.success(`Starting COLMAP pipeline for '${imageDir.name}'`)
  reporter.info(`Working directory: ${imageDir.parent}`)
  reporter.info(`Docker image: ${config.dockerImage}`)
  describeSelection(config, reporter)

  const selection: StepSelection = {
    step: config.step,
    startFrom: config.startFrom,
    stopAt: config.stopAt,
    skipDense: config.skipDense,
    skipMesh: config.skipMesh,
  }
  if (selectSteps(PIPELINE_STEPS, selection).length === 0) {
    reporter.warning('No pipeline steps left to run after applying --skip-dense/--skip-mesh')
    throwIfAborted(signal)
    return
  }

  const result = await runPipeline({
    context: {
      ...target,
      dockerImage: config.dockerImage,
      dockerPath: config.dockerPath,
      maxImageSize: config.maxImageSize,
      gpus: config.gpus,
    },
    selection,
    reporter,
    runner,
    signal,
    showSpinner: isRichTty(stderr),
  })

  reportPipelineSummary({
    reporter,
    imageDirName: imageDir.name,
    skipDense: config.skipDense,
    skipMesh: config.skipMesh,
    elapsedMs: result.elapsedMs,
  })
}
