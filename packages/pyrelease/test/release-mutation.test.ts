import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { MutationError } from '../src/errors'
import { release } from '../src/release'
import { ExitCode } from '../src/types'
import { createFakeRunner, createScriptedConfirmer, MANIFEST } from './fakes'

const { rewrite } = vi.hoisted(() => ({
  rewrite: { content: '' },
}))

// Writes `rewrite.content` instead of the real edit, then reads back like the real one
vi.mock('../src/manifest', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/manifest')>()
  return {
    ...actual,
    writeManifestVersion: vi.fn((filePath: string) => {
      writeFileSync(filePath, rewrite.content, 'utf-8')
      return actual.getManifestVersions(readFileSync(filePath, 'utf-8'))
    }),
  }
})

describe('release with a failed version rewrite', () => {
  let tempDir: string
  let manifestPath: string

  beforeEach(() => {
    tempDir = join(tmpdir(), `pyrelease-mutation-test-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`)
    mkdirSync(tempDir, { recursive: true })
    manifestPath = join(tempDir, 'pyproject.toml')
    writeFileSync(manifestPath, MANIFEST)
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  it('should restore the manifest and stop before cleaning or building', async () => {
    rewrite.content = '[project]\nversion="garbled"\n'
    mkdirSync(join(tempDir, 'dist'))
    const { runner, calls } = createFakeRunner()
    const { confirmer } = createScriptedConfirmer([true])

    const result = await release({ version: '1.0.5', cwd: tempDir, runner, confirmer, quiet: true })

    expect(result.status).toBe('rolled-back')
    expect(result.exitCode).toBe(ExitCode.Failure)
    expect(result.error).toBeInstanceOf(MutationError)
    expect(result.error?.message).toBe('Failed to update version in pyproject.toml')
    expect(readFileSync(manifestPath, 'utf-8')).toBe(MANIFEST)
    expect(existsSync(`${manifestPath}.backup`)).toBe(false)
    expect(existsSync(join(tempDir, 'dist'))).toBe(true)
    expect(calls).not.toContain('python -m build')
  })

  it('should reject a rewrite that leaves a later version line behind', async () => {
    rewrite.content = '[project]\nversion = "1.0.5"\n\n[tool.bumper]\nversion = "1.0.4"\n'
    const { runner, calls } = createFakeRunner()
    const { confirmer } = createScriptedConfirmer([true])

    const result = await release({ version: '1.0.5', cwd: tempDir, runner, confirmer, quiet: true })

    expect(result.status).toBe('rolled-back')
    expect(result.error).toBeInstanceOf(MutationError)
    expect(result.error instanceof MutationError && result.error.hint).toBe('Read back 1.0.4 instead of 1.0.5')
    expect(readFileSync(manifestPath, 'utf-8')).toBe(MANIFEST)
    expect(calls).not.toContain('python -m build')
  })
})
