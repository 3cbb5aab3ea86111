import { ansi, supportsColor } from './terminal.js'

export type Severity = 'step' | 'success' | 'info' | 'warning' | 'error'

const SEVERITY_STYLE: Record<Severity, { tag: string; code: string; stream: 'stdout' | 'stderr' }> =
  {
    step: { tag: '[STEP]', code: '0;34', stream: 'stdout' },
    success: { tag: '[SUCCESS]', code: '0;32', stream: 'stdout' },
    info: { tag: '[INFO]', code: '0;35', stream: 'stdout' },
    warning: { tag: '[WARNING]', code: '1;33', stream: 'stderr' },
    error: { tag: '[ERROR]', code: '0;31', stream: 'stderr' },
  }

export type Reporter = {
  step: (message: string) => void
  success: (message: string) => void
  info: (message: string) => void
  warning: (message: string) => void
  error: (message: string) => void
  /** Untagged line on stdout (banners, summaries, echoed tool output). */
  plain: (message?: string) => void
  /** Debug line, only written in verbose mode. */
  debug: (message: string) => void
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  verbose: boolean
}

export function createReporter({
  stdout,
  stderr,
  env,
  verbose = false,
}: {
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  env: Record<string, string | undefined>
  verbose?: boolean
}): Reporter {
  const color = {
    stdout: supportsColor(stdout, env),
    stderr: supportsColor(stderr, env),
  }

  const write = (severity: Severity, message: string) => {
    const style = SEVERITY_STYLE[severity]
    const stream = style.stream === 'stdout' ? stdout : stderr
    stream.write(`${ansi(style.code, style.tag, color[style.stream])} ${message}\n`)
  }

  return {
    step: (message) => write('step', message),
    success: (message) => write('success', message),
    info: (message) => write('info', message),
    warning: (message) => write('warning', message),
    error: (message) => write('error', message),
    plain: (message = '') => {
      stdout.write(`${message}\n`)
    },
    debug: (message) => {
      if (verbose) write('info', message)
    },
    stdout,
    stderr,
    verbose,
  }
}
