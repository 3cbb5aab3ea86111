import { mkdirSync, mkdtempSync, symlinkSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { InputError } from '../src/errors.js'
import { checkImageDirectory, countImages, isImageFile } from '../src/input/validate.js'
import { createReporter } from '../src/run/reporter.js'
import { collectStream, noopStream } from './helpers/streams.js'

const extensions = ['.jpg', '.JPG', '.jpeg', '.JPEG', '.png', '.PNG', '.tif', '.TIF', '.tiff', '.TIFF', '.Jpg']

describe('image directory validation', () => {
  it('recognizes supported extensions in any case', () => {
    for (const ext of extensions) {
      expect(isImageFile(`shot${ext}`)).toBe(true)
    }
    expect(isImageFile('notes.txt')).toBe(false)
    expect(isImageFile('clip.mp4')).toBe(false)
    expect(isImageFile('jpg')).toBe(false)
  })

  it.each(extensions)('accepts a directory holding one %s file', async (ext) => {
    const dir = mkdtempSync(join(tmpdir(), 'reconstruct-validate-'))
    writeFileSync(join(dir, `image${ext}`), 'x')
    await expect(checkImageDirectory(dir)).resolves.toBe(1)
  })

  it('counts symlinked images but does not follow symlinked directories', async () => {
    const root = mkdtempSync(join(tmpdir(), 'reconstruct-validate-'))
    const originals = join(root, 'originals')
    const photos = join(root, 'photos')
    mkdirSync(originals)
    mkdirSync(photos)
    writeFileSync(join(originals, 'a.jpg'), 'x')
    writeFileSync(join(originals, 'b.jpg'), 'x')
    symlinkSync(join(originals, 'a.jpg'), join(photos, 'a.jpg'))
    symlinkSync(originals, join(photos, 'linked-dir'))
    symlinkSync(join(root, 'missing.jpg'), join(photos, 'dangling.jpg'))

    await expect(checkImageDirectory(photos)).resolves.toBe(1)
  })

  it('rejects a directory without images', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'reconstruct-validate-'))
    writeFileSync(join(dir, 'readme.txt'), 'x')
    await expect(checkImageDirectory(dir)).rejects.toThrow(
      new InputError(`No image files found in '${dir}'`)
    )
  })

  it('rejects a missing directory and a plain file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'reconstruct-validate-'))
    const missing = join(dir, 'missing')
    await expect(checkImageDirectory(missing)).rejects.toThrow(
      `Directory '${missing}' does not exist!`
    )

    const file = join(dir, 'a.jpg')
    writeFileSync(file, 'x')
    await expect(checkImageDirectory(file)).rejects.toBeInstanceOf(InputError)
  })

  it('counts images recursively and reports the total', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'reconstruct-validate-'))
    mkdirSync(join(dir, 'left', 'nested'), { recursive: true })
    writeFileSync(join(dir, 'a.jpg'), 'x')
    writeFileSync(join(dir, 'left', 'b.PNG'), 'x')
    writeFileSync(join(dir, 'left', 'nested', 'c.tiff'), 'x')
    writeFileSync(join(dir, 'left', 'nested', 'd.txt'), 'x')

    expect(await countImages(dir)).toBe(3)

    const stdout = collectStream()
    const reporter = createReporter({ stdout: stdout.stream, stderr: noopStream(), env: {} })
    await checkImageDirectory(dir, reporter)
    expect(stdout.getText()).toBe(`[SUCCESS] Found 3 images in '${dir}'\n`)
  })
})
