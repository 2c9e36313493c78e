import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { PreconditionError } from '../src/errors'
import { getManifestName, getManifestVersion, getManifestVersions, readManifest, replaceManifestVersion, writeManifestVersion } from '../src/manifest'
import { MANIFEST } from './fakes'

describe('Manifest', () => {
  describe('getManifestVersion', () => {
    it('should read the version line', () => {
      expect(getManifestVersion(MANIFEST)).toBe('1.0.4')
    })

    it('should only match a line that starts with the key', () => {
      expect(getManifestVersion('requires-version = "2.0.0"\n  version = "3.0.0"\n')).toBeUndefined()
    })

    it('should not match a line with trailing content', () => {
      expect(getManifestVersion('version = "1.0.0" # pinned\n')).toBeUndefined()
    })

    it('should accept CRLF line endings', () => {
      expect(getManifestVersion('[project]\r\nversion = "0.9.1"\r\n')).toBe('0.9.1')
    })

    it('should return the first version line', () => {
      expect(getManifestVersion('version = "1.0.0"\n[tool.other]\nversion = "9.9.9"\n')).toBe('1.0.0')
    })

    it('should treat an empty value as missing', () => {
      expect(getManifestVersion('version = ""\n')).toBeUndefined()
    })
  })

  describe('getManifestVersions', () => {
    it('should list every version line in order', () => {
      expect(getManifestVersions('version = "1.0.0"\n[tool.other]\nversion = "9.9.9"\n')).toEqual(['1.0.0', '9.9.9'])
    })

    it('should return an empty list without a version line', () => {
      expect(getManifestVersions('[project]\nname = "demo"\n')).toEqual([])
    })
  })

  describe('getManifestName', () => {
    it('should read the project name', () => {
      expect(getManifestName(MANIFEST)).toBe('demo-package')
    })

    it('should return undefined without a name line', () => {
      expect(getManifestName('version = "1.0.0"\n')).toBeUndefined()
    })
  })

  describe('replaceManifestVersion', () => {
    it('should change only the version line', () => {
      const updated = replaceManifestVersion(MANIFEST, '1.0.5')

      expect(updated).toBe(MANIFEST.replace('version = "1.0.4"', 'version = "1.0.5"'))
      expect(updated.split('\n')).toHaveLength(MANIFEST.split('\n').length)
    })

    it('should keep CRLF endings', () => {
      expect(replaceManifestVersion('name = "x"\r\nversion = "1.0.0"\r\nlicense = "MIT"\r\n', '1.1.0'))
        .toBe('name = "x"\r\nversion = "1.1.0"\r\nlicense = "MIT"\r\n')
    })

    it('should rewrite every version line', () => {
      expect(replaceManifestVersion('version = "1.0.0"\n[tool.other]\nversion = "9.9.9"\n', '2.0.0'))
        .toBe('version = "2.0.0"\n[tool.other]\nversion = "2.0.0"\n')
    })

    it('should return the content unchanged when there is no version line', () => {
      const content = '[project]\nname = "demo"\n'
      expect(replaceManifestVersion(content, '1.0.0')).toBe(content)
    })
  })

  describe('files', () => {
    let tempDir: string
    let manifestPath: string

    beforeEach(() => {
      tempDir = join(tmpdir(), `pyrelease-manifest-test-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`)
      mkdirSync(tempDir, { recursive: true })
      manifestPath = join(tempDir, 'pyproject.toml')
    })

    afterEach(() => {
      if (existsSync(tempDir)) {
        rmSync(tempDir, { recursive: true, force: true })
      }
    })

    it('should read version and name', () => {
      writeFileSync(manifestPath, MANIFEST)

      expect(readManifest(manifestPath)).toEqual({
        version: '1.0.4',
        name: 'demo-package',
      })
    })

    it('should throw a precondition error for a missing file', () => {
      expect(() => readManifest(manifestPath)).toThrow(PreconditionError)
      expect(() => readManifest(manifestPath)).toThrow(`${manifestPath} not found!`)
    })

    it('should write the new version and return what it reads back', () => {
      writeFileSync(manifestPath, MANIFEST)

      expect(writeManifestVersion(manifestPath, '2.0.0')).toEqual(['2.0.0'])
      expect(readFileSync(manifestPath, 'utf-8')).toContain('\nversion = "2.0.0"\n')
    })

    it('should return nothing when the file has no version line to rewrite', () => {
      writeFileSync(manifestPath, '[project]\nname = "demo"\n')

      expect(writeManifestVersion(manifestPath, '2.0.0')).toEqual([])
      expect(readFileSync(manifestPath, 'utf-8')).toBe('[project]\nname = "demo"\n')
    })
  })
})
