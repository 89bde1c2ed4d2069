/**
 * Tests for recursive directory comparison.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { diffDirectories, directoriesEqual, formatDifference } from '../dir-compare.js'

let root: string
let left: string
let right: string

function writeTree(base: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = join(base, rel)
    mkdirSync(join(full, '..'), { recursive: true })
    writeFileSync(full, content)
  }
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'specgen-compare-'))
  left = join(root, 'left')
  right = join(root, 'right')
  mkdirSync(left)
  mkdirSync(right)
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

describe('directoriesEqual', () => {
  it('is true for identical trees', async () => {
    const files = { 'foo.spec': 'Name: foo\n', '.gear/rules': 'tar: .\n' }
    writeTree(left, files)
    writeTree(right, files)
    expect(await directoriesEqual(left, right)).toBe(true)
  })

  it('is false when one byte differs', async () => {
    writeTree(left, { 'foo.spec': 'Name: foo\n' })
    writeTree(right, { 'foo.spec': 'Name: fop\n' })
    expect(await directoriesEqual(left, right)).toBe(false)
  })

  it('ignores .git directories by default', async () => {
    writeTree(left, { 'foo.spec': 'x', '.git/HEAD': 'ref: refs/heads/sisyphus\n' })
    writeTree(right, { 'foo.spec': 'x' })
    expect(await directoriesEqual(left, right)).toBe(true)
  })

  it('ignores other version-control metadata directories', async () => {
    writeTree(left, { 'foo.spec': 'x', '.hg/store': 's', '.svn/entries': 'e' })
    writeTree(right, { 'foo.spec': 'x', '.bzr/branch-format': 'b', 'CVS/Root': 'r' })
    expect(await directoriesEqual(left, right)).toBe(true)
  })

  it('follows symbolic links and compares what they point to', async () => {
    writeTree(root, { 'one.spec': 'one\n', 'two.spec': 'two\n' })
    symlinkSync(join(root, 'one.spec'), join(left, 'x.spec'))
    symlinkSync(join(root, 'two.spec'), join(right, 'x.spec'))
    expect(await directoriesEqual(left, right)).toBe(false)
  })

  it('treats a link and a regular file with the same content as equal', async () => {
    writeTree(root, { 'target.spec': 'same\n' })
    symlinkSync(join(root, 'target.spec'), join(left, 'x.spec'))
    writeTree(right, { 'x.spec': 'same\n' })
    expect(await directoriesEqual(left, right)).toBe(true)
  })

  it('compares dangling links by their targets', async () => {
    symlinkSync('missing-a', join(left, 'x.spec'))
    symlinkSync('missing-b', join(right, 'x.spec'))
    expect(await directoriesEqual(left, right)).toBe(false)

    rmSync(join(right, 'x.spec'))
    symlinkSync('missing-a', join(right, 'x.spec'))
    expect(await directoriesEqual(left, right)).toBe(true)
  })

  it('honours a custom ignore list', async () => {
    writeTree(left, { 'foo.spec': 'x', 'notes.txt': 'n' })
    writeTree(right, { 'foo.spec': 'x' })
    expect(await directoriesEqual(left, right, { ignore: ['notes.txt'] })).toBe(true)
  })
})

describe('diffDirectories', () => {
  it('reports nothing for identical trees', async () => {
    writeTree(left, { 'a/b/c.txt': 'c' })
    writeTree(right, { 'a/b/c.txt': 'c' })
    expect(await diffDirectories(left, right)).toEqual([])
  })

  it('reports entries present on one side only', async () => {
    writeTree(left, { 'foo.spec': 'x', 'extra.patch': 'p' })
    writeTree(right, { 'foo.spec': 'x', '.gear/rules': 'tar: .\n' })
    const diffs = await diffDirectories(left, right)
    expect(diffs.map(formatDifference)).toEqual([
      `Only in ${right}: .gear`,
      `Only in ${left}: extra.patch`,
    ])
  })

  it('reports differing files in nested directories', async () => {
    writeTree(left, { '.gear/rules': 'tar: .\n' })
    writeTree(right, { '.gear/rules': 'tar: v@version@:.\n' })
    const diffs = await diffDirectories(left, right)
    expect(diffs.map(formatDifference)).toEqual([
      `Files ${join(left, '.gear', 'rules')} and ${join(right, '.gear', 'rules')} differ`,
    ])
  })

  it('reports links to different content as differing files', async () => {
    writeTree(root, { 't1': 'one', 't2': 'two' })
    symlinkSync(join(root, 't1'), join(left, 'x.spec'))
    symlinkSync(join(root, 't2'), join(right, 'x.spec'))
    const diffs = await diffDirectories(left, right)
    expect(diffs.map(formatDifference)).toEqual([
      `Files ${join(left, 'x.spec')} and ${join(right, 'x.spec')} differ`,
    ])
  })

  it('reports a directory on one side and a file on the other', async () => {
    writeTree(left, { 'docs/readme': 'r' })
    writeTree(right, { docs: 'not a dir' })
    const diffs = await diffDirectories(left, right)
    expect(diffs.map(formatDifference)).toEqual([
      `File ${join(left, 'docs')} is a directory while file ${join(right, 'docs')} is a regular file`,
    ])
  })
})
