export type ReconstructErrorKind =
  | 'input'
  | 'missing-tool'
  | 'process'
  | 'artifact'
  | 'validation'
  | 'config'
  | 'interrupted'

/**
 * Base class for every failure the CLI reports. `details` are extra lines printed
 * under the message (captured tool output, install hints).
 */
export class ReconstructError extends Error {
  readonly kind: ReconstructErrorKind
  readonly details: string[]

  constructor(kind: ReconstructErrorKind, message: string, details: string[] = []) {
    super(message)
    this.name = new.target.name
    this.kind = kind
    this.details = details
  }
}

export class InputError extends ReconstructError {
  constructor(message: string) {
    super('input', message)
  }
}

export class ValidationError extends ReconstructError {
  constructor(message: string) {
    super('validation', message)
  }
}

export class ConfigError extends ReconstructError {
  constructor(message: string) {
    super('config', message)
  }
}

export class ArtifactError extends ReconstructError {
  constructor(message: string) {
    super('artifact', message)
  }
}

export class InterruptedError extends ReconstructError {
  constructor(message = 'Pipeline interrupted by user') {
    super('interrupted', message)
  }
}

export class MissingToolError extends ReconstructError {
  readonly tool: string
  readonly hints: string[]

  constructor({ tool, command, hints = [] }: { tool: string; command: string; hints?: string[] }) {
    super('missing-tool', `${tool} not found (tried "${command}")`, hints)
    this.tool = tool
    this.hints = hints
  }
}

export class ProcessError extends ReconstructError {
  readonly label: string
  readonly exitCode: number | null
  readonly stdout: string
  readonly stderr: string

  constructor({
    label,
    exitCode,
    stdout,
    stderr,
  }: {
    label: string
    exitCode: number | null
    stdout: string
    stderr: string
  }) {
    super('process', `${label} exited with code ${exitCode ?? 'null'}`, describeOutput(stdout, stderr))
    this.label = label
    this.exitCode = exitCode
    this.stdout = stdout
    this.stderr = stderr
  }
}

export class StepFailedError extends ReconstructError {
  readonly stepLabel: string
  readonly elapsedSeconds: number
  readonly failure: ProcessError

  constructor({
    stepLabel,
    elapsedSeconds,
    failure,
  }: {
    stepLabel: string
    elapsedSeconds: number
    failure: ProcessError
  }) {
    super('process', `Pipeline failed at step: ${stepLabel}`, [
      `${stepLabel} failed after ${elapsedSeconds.toFixed(1)}s`,
      `Return code: ${failure.exitCode ?? 'null'}`,
      ...describeOutput(failure.stdout, failure.stderr),
    ])
    this.stepLabel = stepLabel
    this.elapsedSeconds = elapsedSeconds
    this.failure = failure
  }
}

function describeOutput(stdout: string, stderr: string): string[] {
  const lines: string[] = []
  if (stderr.trim()) lines.push(`Error output: ${stderr.trim()}`)
  if (stdout.trim()) lines.push(`Standard output: ${stdout.trim()}`)
  return lines
}

export function throwIfAborted(signal?: AbortSignal | null): void {
  if (signal?.aborted) throw new InterruptedError()
}

export function isReconstructError(error: unknown): error is ReconstructError {
  return error instanceof ReconstructError
}
