import { type Dirent, promises as fs } from 'node:fs'
import path from 'node:path'

import { InputError } from '../errors.js'
import type { Reporter } from '../run/reporter.js'

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set(['.jpg', '.jpeg', '.png', '.tiff', '.tif'])

export function isImageFile(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase())
}

/** Regular files, and symlinks whose target is one. */
export async function isFileEntry(dir: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) return true
  if (!entry.isSymbolicLink()) return false
  const stat = await fs.stat(path.join(dir, entry.name)).catch(() => null)
  return stat?.isFile() ?? false
}

// Symlinked directories are not followed.
async function listFilesRecursive(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  const files: string[] = []
  for (const entry of entries) {
    const full = path.join(dir, entry.name)
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(full)))
    } else if (await isFileEntry(dir, entry)) {
      files.push(full)
    }
  }
  return files
}

export async function countImages(dir: string): Promise<number> {
  const files = await listFilesRecursive(dir)
  return files.filter(isImageFile).length
}

/** Throws unless `dir` is a directory holding at least one image (searched recursively). */
export async function checkImageDirectory(dir: string, reporter?: Reporter | null): Promise<number> {
  const stat = await fs.stat(dir).catch(() => null)
  if (!stat?.isDirectory()) {
    throw new InputError(`Directory '${dir}' does not exist!`)
  }

  const count = await countImages(dir)
  if (count === 0) {
    throw new InputError(`No image files found in '${dir}'`)
  }

  reporter?.success(`Found ${count} images in '${dir}'`)
  return count
}
