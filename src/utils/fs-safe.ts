/**
 * Filesystem helpers shared by the staging code.
 */

import { rmSync } from 'node:fs'
import { mkdtemp, open, rename, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { basename, dirname, join } from 'node:path'

/** Read the `code` property of a Node system error, or '' */
export function errorCode(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err
    return typeof code === 'string' ? code : ''
  }
  return ''
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await stat(p)
    return true
  } catch (err) {
    const code = errorCode(err)
    if (code === 'ENOENT' || code === 'ENOTDIR') return false
    throw err
  }
}

/**
 * Replace the contents of `filePath` in one step: the data goes to a
 * temporary sibling which is then renamed over the target.
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const dir = dirname(filePath)
  const tmp = join(dir, `.${basename(filePath)}.tmp.${process.pid}.${Date.now()}`)
  let tmpCreated = false
  try {
    const handle = await open(tmp, 'wx')
    tmpCreated = true
    try {
      await handle.writeFile(contents, 'utf8')
      await handle.sync()
    } finally {
      await handle.close()
    }
    await rename(tmp, filePath)
  } catch (err) {
    if (tmpCreated) {
      await rm(tmp, { force: true })
    }
    throw err
  }
}

/** Exit status after cleanup on a terminating signal (128 + signal number) */
const SIGNAL_EXIT_CODES = { SIGINT: 130, SIGTERM: 143 } as const

/**
 * Run `fn` inside a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or throws. SIGINT and SIGTERM received while `fn`
 * runs remove the directory before the process exits.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix))

  const onSignal = (signal: NodeJS.Signals): void => {
    rmSync(dir, { recursive: true, force: true })
    process.exit(signal === 'SIGTERM' ? SIGNAL_EXIT_CODES.SIGTERM : SIGNAL_EXIT_CODES.SIGINT)
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  try {
    return await fn(dir)
  } finally {
    process.removeListener('SIGINT', onSignal)
    process.removeListener('SIGTERM', onSignal)
    await rm(dir, { recursive: true, force: true })
  }
}
