import { spawn } from 'node:child_process'

import { InterruptedError, MissingToolError, ProcessError, throwIfAborted } from './errors.js'

const MAX_CAPTURE_CHARS = 65_536

export type ProcessRequest = {
  command: string
  args: string[]
  /** Short tool name used in error messages ("docker", "ffmpeg"). */
  label: string
  cwd?: string
  /** Forward child output live while still capturing it. */
  passthrough?: { stdout: NodeJS.WritableStream; stderr: NodeJS.WritableStream } | null
  /** Printed when the binary cannot be found. */
  installHints?: string[]
  signal?: AbortSignal | null
}

export type ProcessResult = {
  stdout: string
  stderr: string
}

/** Runs one external process to completion. Rejects on non-zero exit. */
export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessResult>

function appendCapped(current: string, chunk: string): string {
  const next = current + chunk
  return next.length > MAX_CAPTURE_CHARS ? next.slice(-MAX_CAPTURE_CHARS) : next
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ')
}

export const runProcess: ProcessRunner = async ({
  command,
  args,
  label,
  cwd,
  passthrough,
  installHints,
  signal,
}) => {
  throwIfAborted(signal)

  return await new Promise<ProcessResult>((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: signal ?? undefined,
    })
    let stdout = ''
    let stderr = ''
    let settled = false

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      fn()
    }

    if (proc.stdout) {
      proc.stdout.setEncoding('utf8')
      proc.stdout.on('data', (chunk: string) => {
        stdout = appendCapped(stdout, chunk)
        passthrough?.stdout.write(chunk)
      })
    }
    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        stderr = appendCapped(stderr, chunk)
        passthrough?.stderr.write(chunk)
      })
    }

    proc.on('error', (error) => {
      settle(() => {
        if (error.name === 'AbortError') {
          reject(new InterruptedError())
          return
        }
        if (isErrnoException(error) && error.code === 'ENOENT') {
          reject(new MissingToolError({ tool: label, command, hints: installHints }))
          return
        }
        reject(error)
      })
    })

    proc.on('close', (code) => {
      settle(() => {
        if (code === 0) {
          resolve({ stdout, stderr })
          return
        }
        if (signal?.aborted) {
          reject(new InterruptedError())
          return
        }
        reject(new ProcessError({ label, exitCode: code, stdout, stderr }))
      })
    })
  })
}
