import { type Dirent, promises as fs } from 'node:fs'
import path from 'node:path'

import { isFileEntry, isImageFile } from '../input/validate.js'
import type { Reporter } from '../run/reporter.js'
import {
  DATABASE_FILENAME,
  formatStepLabel,
  fusedCloudPath,
  meshPath,
  PIPELINE_STEPS,
  sparseModelPath,
} from './steps.js'
import type { StepStatus } from './types.js'

// Feature extraction alone leaves a small database; matches push it past this.
export const MATCHED_DATABASE_MIN_BYTES = 1000

type StatusTarget = {
  workDir: string
  imageDirName: string
}

async function pathExists(target: string): Promise<boolean> {
  return (await fs.stat(target).catch(() => null)) !== null
}

async function fileSize(target: string): Promise<number | null> {
  const stat = await fs.stat(target).catch(() => null)
  return stat?.isFile() ? stat.size : null
}

async function someFile(dir: string, predicate: (name: string) => boolean): Promise<boolean> {
  let entries: Dirent[]
  try {
    entries = await fs.readdir(dir, { withFileTypes: true })
  } catch {
    return false
  }
  for (const entry of entries) {
    if (predicate(entry.name) && (await isFileEntry(dir, entry))) return true
  }
  return false
}

/**
 * Infers from files on disk whether a step has already produced its output.
 * Advisory only; execution never consults it.
 */
export async function isStepCompleted(
  stepNumber: number,
  { workDir, imageDirName }: StatusTarget
): Promise<boolean> {
  const resolve = (relative: string) => path.join(workDir, relative)
  const dense = resolve(`${imageDirName}/dense`)

  switch (stepNumber) {
    case 1:
      return await pathExists(resolve(DATABASE_FILENAME))
    case 2: {
      const size = await fileSize(resolve(DATABASE_FILENAME))
      return size !== null && size > MATCHED_DATABASE_MIN_BYTES
    }
    case 3:
      return await pathExists(resolve(sparseModelPath(imageDirName)))
    case 4:
      return await someFile(path.join(dense, 'images'), isImageFile)
    case 5:
      return await someFile(path.join(dense, 'stereo', 'depth_maps'), (name) =>
        name.endsWith('.geometric.bin')
      )
    case 6:
      return await pathExists(resolve(fusedCloudPath(imageDirName)))
    case 7:
      return await pathExists(resolve(meshPath(imageDirName)))
    default:
      return false
  }
}

export async function readPipelineStatus(target: StatusTarget): Promise<StepStatus[]> {
  const statuses: StepStatus[] = []
  for (const step of PIPELINE_STEPS) {
    statuses.push({
      number: step.number,
      name: step.name,
      completed: await isStepCompleted(step.number, target),
    })
  }
  return statuses
}

export async function reportPipelineStatus(
  target: StatusTarget,
  reporter: Reporter
): Promise<StepStatus[]> {
  const statuses = await readPipelineStatus(target)
  reporter.info('Pipeline step status:')
  for (const status of statuses) {
    reporter.info(
      `  Step ${formatStepLabel(status)}: ${status.completed ? 'COMPLETED' : 'NOT DONE'}`
    )
  }
  return statuses
}
