import ora from 'ora'

export type Spinner = {
  stopAndClear: () => void
}

export function startSpinner({
  text,
  enabled,
  stream,
}: {
  text: string
  enabled: boolean
  stream: NodeJS.WritableStream
}): Spinner {
  if (!enabled) {
    return { stopAndClear: () => {} }
  }

  const spinner = ora({
    text,
    stream,
    spinner: 'dots12',
    color: 'cyan',
    discardStdin: false,
  }).start()

  return {
    stopAndClear: () => {
      if (spinner.isSpinning) spinner.stop()
      // ora can leave the frame behind on some terminals.
      spinner.clear()
      stream.write('\r\u001b[2K')
    },
  }
}
