#!/usr/bin/env node
import { runCliMain } from './cli-main.js'

const controller = new AbortController()
const onSigint = () => controller.abort()
process.once('SIGINT', onSigint)

const exitCode = await runCliMain({
  argv: process.argv.slice(2),
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
  signal: controller.signal,
})

process.off('SIGINT', onSigint)
process.exitCode = exitCode
