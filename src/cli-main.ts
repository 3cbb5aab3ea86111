import { InterruptedError, isReconstructError, MissingToolError } from './errors.js'
import type { ProcessRunner } from './process.js'
import { runCli } from './run.js'
import { createReporter, type Reporter } from './run/reporter.js'

export function reportError(error: unknown, reporter: Reporter): void {
  if (error instanceof InterruptedError) {
    reporter.warning(error.message)
    return
  }
  if (error instanceof MissingToolError) {
    reporter.error(error.message)
    for (const hint of error.hints) reporter.info(hint)
    return
  }
  if (isReconstructError(error)) {
    reporter.error(error.message)
    for (const line of error.details) reporter.error(line)
    return
  }
  const message = error instanceof Error ? error.message : String(error)
  reporter.error(`Unexpected error: ${message}`)
}

/** Runs the CLI and maps the outcome to an exit code: 0 on success, 1 on any failure. */
export async function runCliMain({
  argv,
  env,
  stdout,
  stderr,
  runner,
  signal,
}: {
  argv: string[]
  env: Record<string, string | undefined>
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  runner?: ProcessRunner
  signal?: AbortSignal | null
}): Promise<number> {
  try {
    await runCli(argv, { env, stdout, stderr, runner, signal })
    return 0
  } catch (error) {
    reportError(error, createReporter({ stdout, stderr, env }))
    return 1
  }
}
