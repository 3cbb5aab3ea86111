import { promises as fs } from 'node:fs'
import path from 'node:path'

import { FRAMES_DIR_SUFFIX, isVideoFile, resolveFramesDir } from './input/resolve.js'
import { DATABASE_FILENAME } from './pipeline/steps.js'
import type { Reporter } from './run/reporter.js'

const EXTRACTED_FRAME_PATTERN = /^frame_.*\.(jpg|png)$/

async function statOrNull(target: string) {
  return await fs.stat(target).catch(() => null)
}

/**
 * Image directory a run on `inputPath` would use, without extracting anything.
 */
export async function resolveCleanTarget(
  inputPath: string
): Promise<{ imageDir: string; workDir: string }> {
  const resolved = path.resolve(inputPath)
  const stat = await statOrNull(resolved)
  const imageDir = stat?.isFile() && isVideoFile(resolved) ? resolveFramesDir(resolved) : resolved
  return { imageDir, workDir: path.dirname(resolved) }
}

/**
 * Removes generated artifacts for an input. Frames are only deleted from a
 * `*_frames` directory so user-supplied image folders keep their images.
 * Returns a description of each removed item; empty when nothing was there.
 */
export async function cleanGeneratedFiles({
  inputPath,
  reporter,
}: {
  inputPath: string
  reporter?: Reporter | null
}): Promise<string[]> {
  const { imageDir, workDir } = await resolveCleanTarget(inputPath)
  const imageDirName = path.basename(imageDir)
  const cleaned: string[] = []

  const databasePath = path.join(workDir, DATABASE_FILENAME)
  if (await statOrNull(databasePath)) {
    await fs.rm(databasePath, { force: true })
    cleaned.push(DATABASE_FILENAME)
  }

  const imageDirStat = await statOrNull(imageDir)
  if (imageDirName.endsWith(FRAMES_DIR_SUFFIX) && imageDirStat?.isDirectory()) {
    const entries = await fs.readdir(imageDir, { withFileTypes: true })
    const frames = entries.filter(
      (entry) => entry.isFile() && EXTRACTED_FRAME_PATTERN.test(entry.name)
    )
    for (const frame of frames) {
      await fs.rm(path.join(imageDir, frame.name), { force: true })
    }
    if (frames.length > 0) cleaned.push(`${frames.length} extracted frames`)

    if ((await fs.readdir(imageDir)).length === 0) {
      await fs.rmdir(imageDir)
      cleaned.push(`empty ${imageDirName} directory`)
    }
  }

  for (const sub of ['sparse', 'dense']) {
    const target = path.join(imageDir, sub)
    if (await statOrNull(target)) {
      await fs.rm(target, { recursive: true, force: true })
      cleaned.push(`${imageDirName}/${sub}/`)
    }
  }

  if (reporter?.verbose && cleaned.length > 0) {
    reporter.info('Cleaned files:')
    for (const item of cleaned) reporter.info(`  • ${item}`)
  }

  return cleaned
}
