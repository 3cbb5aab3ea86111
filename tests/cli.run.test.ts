import { existsSync, mkdirSync, mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { runCliMain } from '../src/cli-main.js'
import type { ProcessRequest } from '../src/process.js'
import {
  colmapSubcommand,
  createFakeRunner,
  failingProcess,
  simulateColmap,
} from './helpers/fake-runner.js'
import { collectStream } from './helpers/streams.js'

function setupProject(imageCount = 3) {
  const root = mkdtempSync(join(tmpdir(), 'reconstruct-cli-'))
  const photos = join(root, 'photos')
  mkdirSync(photos)
  for (let i = 1; i <= imageCount; i += 1) {
    writeFileSync(join(photos, `IMG_${i}.JPG`), 'x')
  }
  return { root, photos }
}

async function run(
  argv: string[],
  {
    root,
    handler = () => ({ stdout: '', stderr: '' }),
    signal,
    onWrite,
  }: {
    root: string
    handler?: (request: ProcessRequest) => { stdout: string; stderr: string }
    signal?: AbortSignal
    onWrite?: (chunk: string) => void
  }
) {
  const stdout = collectStream({ onWrite })
  const stderr = collectStream({ onWrite })
  const runner = createFakeRunner(handler)
  const exitCode = await runCliMain({
    argv,
    env: { HOME: root },
    stdout: stdout.stream,
    stderr: stderr.stream,
    runner,
    signal,
  })
  return { exitCode, stdout, stderr, runner }
}

describe('reconstruct cli', () => {
  it('runs all seven steps and prints the summary', async () => {
    const { root, photos } = setupProject()
    const { exitCode, stdout, stderr, runner } = await run([photos], {
      root,
      handler: (request) => simulateColmap(request, 'photos'),
    })

    expect(exitCode).toBe(0)
    expect(stderr.getText()).toBe('')
    expect(runner.calls.map(colmapSubcommand)).toEqual([
      'feature_extractor',
      'exhaustive_matcher',
      'mapper',
      'image_undistorter',
      'patch_match_stereo',
      'stereo_fusion',
      'poisson_mesher',
    ])
    expect(runner.calls.every((call) => call.cwd === root)).toBe(true)

    const lines = stdout.getLines()
    expect(lines.slice(0, 5)).toEqual([
      '[INFO] Input is a directory: photos',
      `[SUCCESS] Found 3 images in '${photos}'`,
      "[SUCCESS] Starting COLMAP pipeline for 'photos'",
      `[INFO] Working directory: ${root}`,
      '[INFO] Docker image: roboticsmicrofarms/colmap:3.8',
    ])
    expect(lines).toContain('[STEP] Running: 1/7 - Feature Extraction')
    expect(lines).toContain('[SUCCESS] COLMAP PIPELINE COMPLETED SUCCESSFULLY!')
    expect(lines).toContain('  • Mesh:                  photos/dense/meshed-poisson.ply')
    expect(lines.at(-1)).toBe('[INFO] You can view the results in MeshLab, Blender, or CloudCompare')
  })

  it('stops after sparse reconstruction with --skip-dense', async () => {
    const { root, photos } = setupProject()
    const { exitCode, stdout, stderr, runner } = await run([photos, '--skip-dense'], {
      root,
      handler: (request) => simulateColmap(request, 'photos'),
    })

    expect(exitCode).toBe(0)
    expect(runner.calls.map(colmapSubcommand)).toEqual([
      'feature_extractor',
      'exhaustive_matcher',
      'mapper',
    ])
    expect(stderr.getText()).toBe('[WARNING] Dense reconstruction will be skipped\n')
    expect(stdout.getText()).not.toContain('Dense point cloud')
  })

  it('warns and exits 0 when the selection leaves nothing to run', async () => {
    const { root, photos } = setupProject()
    const { exitCode, stderr, runner } = await run([photos, '--step', '7', '--skip-mesh'], {
      root,
    })

    expect(exitCode).toBe(0)
    expect(runner.calls).toHaveLength(0)
    expect(stderr.getLines()).toEqual([
      '[WARNING] Mesh generation will be skipped',
      '[WARNING] No pipeline steps left to run after applying --skip-dense/--skip-mesh',
    ])
  })

  it('prints the status table when resuming', async () => {
    const { root, photos } = setupProject()
    const { stdout } = await run([photos, '--start-from', '3', '--stop-at', '3'], {
      root,
      handler: (request) => simulateColmap(request, 'photos'),
    })

    const lines = stdout.getLines()
    expect(lines).toContain('[INFO] Pipeline step status:')
    expect(lines).toContain('  Step 1/7 - Feature Extraction: NOT DONE')
    expect(lines).toContain('[INFO] Running steps 3-3')
  })

  it('fails step 3 when the mapper leaves no model behind', async () => {
    const { root, photos } = setupProject()
    const { exitCode, stderr } = await run([photos, '--step', '3'], { root })

    expect(exitCode).toBe(1)
    expect(stderr.getLines()).toEqual([
      '[ERROR] Sparse reconstruction failed - no model created',
    ])
  })

  it('reports a failing step with its exit code and output', async () => {
    const { root, photos } = setupProject()
    const { exitCode, stderr, runner } = await run([photos], {
      root,
      handler: (request) => {
        if (colmapSubcommand(request) === 'exhaustive_matcher') {
          throw failingProcess('docker', 2, 'out of memory\n')
        }
        return simulateColmap(request, 'photos')
      },
    })

    expect(exitCode).toBe(1)
    expect(runner.calls).toHaveLength(2)
    const lines = stderr.getLines()
    expect(lines[0]).toBe('[ERROR] Pipeline failed at step: 2/7 - Feature Matching')
    expect(lines[1]).toMatch(/^\[ERROR\] 2\/7 - Feature Matching failed after \d+\.\ds$/)
    expect(lines.slice(2)).toEqual(['[ERROR] Return code: 2', '[ERROR] Error output: out of memory'])
  })

  it('rejects conflicting step flags before touching anything', async () => {
    const { root, photos } = setupProject()
    const { exitCode, stderr, runner } = await run(
      [photos, '--clean', '--step', '4', '--start-from', '2'],
      { root }
    )

    expect(exitCode).toBe(1)
    expect(stderr.getText()).toBe('[ERROR] Cannot use --step with --start-from or --stop-at\n')
    expect(runner.calls).toHaveLength(0)
    expect(existsSync(join(photos, 'sparse'))).toBe(false)
  })

  it('fails on a missing input path', async () => {
    const { root } = setupProject()
    const missing = join(root, 'nope')
    const { exitCode, stderr } = await run([missing], { root })

    expect(exitCode).toBe(1)
    expect(stderr.getText()).toBe(`[ERROR] Input path '${missing}' does not exist\n`)
  })

  it('fails on a directory without images', async () => {
    const { root } = setupProject()
    const empty = join(root, 'empty')
    mkdirSync(empty)
    const { exitCode, stderr } = await run([empty], { root })

    expect(exitCode).toBe(1)
    expect(stderr.getText()).toBe(`[ERROR] No image files found in '${empty}'\n`)
  })

  it('cleans and exits with --clean-only', async () => {
    const { root, photos } = setupProject()
    writeFileSync(join(root, 'database.db'), 'db')
    mkdirSync(join(photos, 'sparse', '0'), { recursive: true })

    const { exitCode, stdout, runner } = await run([photos, '--clean-only'], { root })

    expect(exitCode).toBe(0)
    expect(runner.calls).toHaveLength(0)
    expect(stdout.getLines()).toEqual([
      '[STEP] Cleaning generated files...',
      '[SUCCESS] Clean completed',
      '[INFO] Clean-only mode: exiting after cleanup',
    ])
    expect(existsSync(join(root, 'database.db'))).toBe(false)
    expect(existsSync(join(photos, 'sparse'))).toBe(false)
  })

  it('reports nothing to clean on a fresh directory', async () => {
    const { root, photos } = setupProject()
    const { stdout } = await run([photos, '--clean-only'], { root })
    expect(stdout.getLines()).toContain('[INFO] No files to clean')
  })

  it('extracts frames from a video before running the pipeline', async () => {
    const { root } = setupProject()
    const video = join(root, 'walk.mov')
    writeFileSync(video, 'fake video')
    const framesDir = join(root, 'walk_frames')

    const { exitCode, runner, stdout } = await run([video, '--skip-dense'], {
      root,
      handler: (request) => {
        if (request.label === 'ffmpeg') {
          mkdirSync(framesDir, { recursive: true })
          for (let i = 1; i <= 30; i += 1) {
            writeFileSync(join(framesDir, `frame_${String(i).padStart(6, '0')}.jpg`), 'x')
          }
          return { stdout: '', stderr: '' }
        }
        return simulateColmap(request, 'walk_frames')
      },
    })

    expect(exitCode).toBe(0)
    expect(runner.calls[0]?.command).toBe('ffmpeg')
    expect(runner.calls).toHaveLength(4)
    expect(stdout.getLines()).toContain("[SUCCESS] Starting COLMAP pipeline for 'walk_frames'")
  })

  it('stops with a warning when interrupted', async () => {
    const { root, photos } = setupProject()
    const controller = new AbortController()
    controller.abort()
    const { exitCode, stderr, runner } = await run([photos], { root, signal: controller.signal })

    expect(exitCode).toBe(1)
    expect(runner.calls).toHaveLength(0)
    expect(stderr.getText()).toBe('[WARNING] Pipeline interrupted by user\n')
  })

  it('does not clean when interrupted before starting', async () => {
    const { root, photos } = setupProject()
    writeFileSync(join(root, 'database.db'), 'db')
    const controller = new AbortController()
    controller.abort()
    const { exitCode, stdout, stderr } = await run([photos, '--clean-only'], {
      root,
      signal: controller.signal,
    })

    expect(exitCode).toBe(1)
    expect(stdout.getText()).toBe('')
    expect(stderr.getText()).toBe('[WARNING] Pipeline interrupted by user\n')
    expect(existsSync(join(root, 'database.db'))).toBe(true)
  })

  it('ends a clean-only run as interrupted when aborted while cleaning', async () => {
    const { root, photos } = setupProject()
    writeFileSync(join(root, 'database.db'), 'db')
    const controller = new AbortController()
    const { exitCode, stdout, stderr } = await run([photos, '--clean-only'], {
      root,
      signal: controller.signal,
      onWrite: (chunk) => {
        if (chunk.includes('Cleaning generated files')) controller.abort()
      },
    })

    expect(exitCode).toBe(1)
    expect(stdout.getLines()).toEqual([
      '[STEP] Cleaning generated files...',
      '[SUCCESS] Clean completed',
    ])
    expect(stderr.getText()).toBe('[WARNING] Pipeline interrupted by user\n')
  })

  it('ends an empty selection as interrupted when aborted', async () => {
    const { root, photos } = setupProject()
    const controller = new AbortController()
    const { exitCode, stderr, runner } = await run([photos, '--step', '7', '--skip-mesh'], {
      root,
      signal: controller.signal,
      onWrite: (chunk) => {
        if (chunk.includes('Mesh generation will be skipped')) controller.abort()
      },
    })

    expect(exitCode).toBe(1)
    expect(runner.calls).toHaveLength(0)
    expect(stderr.getLines()).toEqual([
      '[WARNING] Mesh generation will be skipped',
      '[WARNING] No pipeline steps left to run after applying --skip-dense/--skip-mesh',
      '[WARNING] Pipeline interrupted by user',
    ])
  })

  it('stops before scanning images when aborted during input resolution', async () => {
    const { root, photos } = setupProject()
    const controller = new AbortController()
    const { exitCode, stdout } = await run([photos], {
      root,
      signal: controller.signal,
      onWrite: (chunk) => {
        if (chunk.includes('Input is a directory')) controller.abort()
      },
    })

    expect(exitCode).toBe(1)
    expect(stdout.getLines()).toEqual(['[INFO] Input is a directory: photos'])
  })

  it('prints help and version', async () => {
    const { root } = setupProject()
    const help = await run(['--help'], { root })
    expect(help.exitCode).toBe(0)
    expect(help.stdout.getText()).toContain('--start-from')

    const version = await run(['--version'], { root })
    expect(version.exitCode).toBe(0)
    expect(version.stdout.getText()).toMatch(/^\d+\.\d+\.\d+/)
  })
})
