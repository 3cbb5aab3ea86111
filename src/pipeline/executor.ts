import { promises as fs } from 'node:fs'
import path from 'node:path'

import { ArtifactError, ProcessError, StepFailedError, throwIfAborted } from '../errors.js'
import { formatCommand, type ProcessRunner, runProcess } from '../process.js'
import type { Reporter } from '../run/reporter.js'
import { formatMinutes, formatSeconds } from '../run/terminal.js'
import { startSpinner } from '../tty/spinner.js'
import {
  buildStepCommand,
  DATABASE_FILENAME,
  formatStepLabel,
  fusedCloudPath,
  meshPath,
  PIPELINE_STEPS,
  selectSteps,
  sparseModelPath,
} from './steps.js'
import type { PipelineStep, StepContext, StepSelection } from './types.js'

export const DOCKER_INSTALL_HINTS = [
  'Please install Docker: https://docs.docker.com/get-docker/',
  'GPU steps also need the NVIDIA Container Toolkit (or run with --no-gpu).',
]

export type PipelineRunResult = {
  executed: number[]
  elapsedMs: number
}

type StepRunOptions = {
  context: StepContext
  reporter: Reporter
  runner: ProcessRunner
  signal?: AbortSignal | null
  showSpinner: boolean
}

async function runStep(step: PipelineStep, options: StepRunOptions): Promise<void> {
  const { context, reporter, runner, signal, showSpinner } = options
  const label = formatStepLabel(step)
  const { command, args } = buildStepCommand(step, context)

  reporter.step(`Running: ${label}`)
  reporter.debug(`Command: ${formatCommand(command, args)}`)

  const spinner = startSpinner({
    text: label,
    enabled: showSpinner && !reporter.verbose,
    stream: reporter.stderr,
  })
  const startedAt = Date.now()
  let stdout: string
  try {
    const result = await runner({
      command,
      args,
      label: 'docker',
      cwd: context.workDir,
      installHints: DOCKER_INSTALL_HINTS,
      passthrough: reporter.verbose ? { stdout: reporter.stdout, stderr: reporter.stderr } : null,
      signal,
    })
    stdout = result.stdout
  } catch (error) {
    if (error instanceof ProcessError) {
      throw new StepFailedError({
        stepLabel: label,
        elapsedSeconds: (Date.now() - startedAt) / 1000,
        failure: error,
      })
    }
    throw error
  } finally {
    spinner.stopAndClear()
  }

  reporter.success(`${label} completed in ${formatSeconds(Date.now() - startedAt)}`)
  if (!reporter.verbose && stdout.trim()) {
    reporter.plain(stdout.trimEnd())
  }
}

/**
 * Runs the selected steps one after another. The first failure aborts the run;
 * nothing is retried and completed steps are never skipped.
 */
export async function runPipeline({
  context,
  selection,
  reporter,
  runner = runProcess,
  signal,
  showSpinner = false,
  steps = PIPELINE_STEPS,
}: {
  context: StepContext
  selection: StepSelection
  reporter: Reporter
  runner?: ProcessRunner
  signal?: AbortSignal | null
  showSpinner?: boolean
  steps?: readonly PipelineStep[]
}): Promise<PipelineRunResult> {
  const selected = selectSteps(steps, selection)
  await fs.mkdir(path.join(context.workDir, context.imageDirName, 'sparse'), { recursive: true })

  const startedAt = Date.now()
  for (const step of selected) {
    throwIfAborted(signal)
    await runStep(step, { context, reporter, runner, signal, showSpinner })

    // The mapper exits 0 even when no model could be registered.
    if (step.category === 'sparse' && step.subcommand === 'mapper') {
      const modelDir = path.join(context.workDir, sparseModelPath(context.imageDirName))
      const stat = await fs.stat(modelDir).catch(() => null)
      if (!stat?.isDirectory()) {
        throw new ArtifactError('Sparse reconstruction failed - no model created')
      }
    }
  }

  return { executed: selected.map((step) => step.number), elapsedMs: Date.now() - startedAt }
}

export function reportPipelineSummary({
  reporter,
  imageDirName,
  skipDense,
  skipMesh,
  elapsedMs,
}: {
  reporter: Reporter
  imageDirName: string
  skipDense: boolean
  skipMesh: boolean
  elapsedMs: number
}): void {
  const rule = '='.repeat(50)
  reporter.plain()
  reporter.plain(rule)
  reporter.success('COLMAP PIPELINE COMPLETED SUCCESSFULLY!')
  reporter.success(`Total processing time: ${formatMinutes(elapsedMs)}`)
  reporter.plain(rule)
  reporter.plain('Output files:')
  reporter.plain(`  • Sparse reconstruction: ${imageDirName}/sparse/`)
  if (!skipDense) {
    reporter.plain(`  • Dense point cloud:     ${fusedCloudPath(imageDirName)}`)
    if (!skipMesh) {
      reporter.plain(`  • Mesh:                  ${meshPath(imageDirName)}`)
    }
  }
  reporter.plain(`  • Database:              ${DATABASE_FILENAME}`)
  reporter.plain()
  reporter.info('You can view the results in MeshLab, Blender, or CloudCompare')
}
