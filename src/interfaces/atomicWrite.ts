import fsp from 'fs/promises'
import path from 'path'

/**
 * Writes through a `.partial` file next to the target and renames it into
 * place, so a failed run never leaves a truncated output behind.
 */
export async function atomicWrite(filePath: string, data: string, encoding: BufferEncoding = 'utf8') {
  const dir = path.dirname(filePath)
  const tmp = path.join(dir, `.${path.basename(filePath)}.partial`)
  await fsp.mkdir(dir, { recursive: true })
  try {
    await fsp.writeFile(tmp, data, encoding)
    await fsp.rename(tmp, filePath)
  } catch (err) {
    await fsp.rm(tmp, { force: true })
    throw err
  }
}
