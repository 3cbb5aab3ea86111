import { readFileSync } from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

const PACKAGE_NAME = 'reconstruct-cli'

function findPackageVersion(startDir: string): string | null {
  let dir = startDir
  for (;;) {
    try {
      const raw = readFileSync(path.join(dir, 'package.json'), 'utf8')
      const parsed: unknown = JSON.parse(raw)
      if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'name' in parsed &&
        parsed.name === PACKAGE_NAME &&
        'version' in parsed &&
        typeof parsed.version === 'string'
      ) {
        return parsed.version
      }
    } catch {
      // keep walking up
    }
    const parent = path.dirname(dir)
    if (parent === dir) return null
    dir = parent
  }
}

function versionFromUrl(url: string): string | null {
  try {
    return findPackageVersion(path.dirname(fileURLToPath(url)))
  } catch {
    return null
  }
}

export function resolvePackageVersion(importMetaUrl: string = import.meta.url): string {
  const fromEnv = process.env.RECONSTRUCT_VERSION?.trim()
  if (fromEnv) return fromEnv
  return versionFromUrl(importMetaUrl) ?? versionFromUrl(import.meta.url) ?? '0.0.0'
}
