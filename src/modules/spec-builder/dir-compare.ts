/**
 * Recursive directory comparison by structure and content.
 *
 * Two entry points share one walker:
 *   directoriesEqual  stops at the first difference (quiet check)
 *   diffDirectories   collects every difference for reporting
 */

import { lstat, readdir, readFile, readlink, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { errorCode } from '../../utils/fs-safe.js'

/** Version-control metadata directories skipped at every level */
export const DEFAULT_IGNORED = ['.git', '.hg', '.bzr', '.svn', 'CVS'] as const

export type DirDifference =
  | { kind: 'only-in'; dir: string; name: string }
  | { kind: 'content'; left: string; right: string }
  | { kind: 'type'; left: string; right: string; leftType: EntryType; rightType: EntryType }

export type EntryType = 'directory' | 'regular file' | 'other'

export interface CompareOptions {
  ignore?: readonly string[]
}

/**
 * Type of the entry at `path`, following symbolic links. A link whose
 * target is missing is 'other'.
 */
async function entryType(path: string): Promise<EntryType> {
  try {
    const stats = await stat(path)
    if (stats.isDirectory()) return 'directory'
    if (stats.isFile()) return 'regular file'
    return 'other'
  } catch (err) {
    const code = errorCode(err)
    if (code === 'ENOENT' || code === 'ELOOP') return 'other'
    throw err
  }
}

async function listEntries(dir: string, ignore: ReadonlySet<string>): Promise<string[]> {
  const names = await readdir(dir)
  return names.filter((name) => !ignore.has(name))
}

async function linkTarget(path: string): Promise<string | undefined> {
  const stats = await lstat(path)
  return stats.isSymbolicLink() ? readlink(path) : undefined
}

async function sameContent(left: string, right: string): Promise<boolean> {
  const [a, b] = await Promise.all([readFile(left), readFile(right)])
  return a.equals(b)
}

/** Entries that are neither files nor directories match when their link targets do */
async function sameTarget(left: string, right: string): Promise<boolean> {
  const [a, b] = await Promise.all([linkTarget(left), linkTarget(right)])
  return a === b
}

/**
 * Walk both trees, passing each difference to `report`. When `report`
 * returns false the walk stops and `walk` resolves false.
 */
async function walk(
  left: string,
  right: string,
  ignore: ReadonlySet<string>,
  report: (diff: DirDifference) => boolean
): Promise<boolean> {
  const [leftEntries, rightEntries] = await Promise.all([
    listEntries(left, ignore),
    listEntries(right, ignore),
  ])
  const leftNames = new Set(leftEntries)
  const rightNames = new Set(rightEntries)
  const names = [...new Set([...leftEntries, ...rightEntries])].sort()

  for (const name of names) {
    if (!leftNames.has(name)) {
      if (!report({ kind: 'only-in', dir: right, name })) return false
      continue
    }
    if (!rightNames.has(name)) {
      if (!report({ kind: 'only-in', dir: left, name })) return false
      continue
    }

    const leftPath = join(left, name)
    const rightPath = join(right, name)
    const [leftType, rightType] = await Promise.all([entryType(leftPath), entryType(rightPath)])

    if (leftType !== rightType) {
      if (!report({ kind: 'type', left: leftPath, right: rightPath, leftType, rightType })) return false
    } else if (leftType === 'directory') {
      if (!(await walk(leftPath, rightPath, ignore, report))) return false
    } else {
      const same =
        leftType === 'regular file'
          ? await sameContent(leftPath, rightPath)
          : await sameTarget(leftPath, rightPath)
      if (!same && !report({ kind: 'content', left: leftPath, right: rightPath })) return false
    }
  }
  return true
}

/**
 * Whether both directories hold the same tree with identical file contents.
 */
export async function directoriesEqual(left: string, right: string, options: CompareOptions = {}): Promise<boolean> {
  const ignore = new Set(options.ignore ?? DEFAULT_IGNORED)
  return walk(left, right, ignore, () => false)
}

/**
 * Every difference between the two trees, in sorted path order.
 */
export async function diffDirectories(left: string, right: string, options: CompareOptions = {}): Promise<DirDifference[]> {
  const ignore = new Set(options.ignore ?? DEFAULT_IGNORED)
  const diffs: DirDifference[] = []
  await walk(left, right, ignore, (diff) => {
    diffs.push(diff)
    return true
  })
  return diffs
}

/**
 * One human-readable line per difference, in the style of `diff -rq`.
 */
export function formatDifference(diff: DirDifference): string {
  switch (diff.kind) {
    case 'only-in':
      return `Only in ${diff.dir}: ${diff.name}`
    case 'content':
      return `Files ${diff.left} and ${diff.right} differ`
    case 'type':
      return `File ${diff.left} is a ${diff.leftType} while file ${diff.right} is a ${diff.rightType}`
  }
}
