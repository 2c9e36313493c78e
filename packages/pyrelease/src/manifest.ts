import type { ManifestInfo } from './types'
import { existsSync, readFileSync, writeFileSync } from 'node:fs'
import { PreconditionError } from './errors'

const VERSION_LINE = /^version = "([^"]*)"(\r?)$/gm
const NAME_LINE = /^name = "([^"]*)"\r?$/m

/**
 * Every `version = "..."` value in file order
 */
export function getManifestVersions(content: string): string[] {
  return Array.from(content.matchAll(VERSION_LINE), match => match[1] ?? '')
}

/**
 * The first version line is the current version
 */
export function getManifestVersion(content: string): string | undefined {
  return getManifestVersions(content)[0] || undefined
}

export function getManifestName(content: string): string | undefined {
  const match = content.match(NAME_LINE)
  return match?.[1] || undefined
}

/**
 * Read the fields the release cares about
 */
export function readManifest(filePath: string): ManifestInfo {
  if (!existsSync(filePath)) {
    throw new PreconditionError(`${filePath} not found!`, {
      hint: 'Run the release from the project directory or pass --manifest',
    })
  }

  const content = readFileSync(filePath, 'utf-8')
  return {
    version: getManifestVersion(content),
    name: getManifestName(content),
  }
}

/**
 * Return the content with every version line replaced and nothing else touched
 */
export function replaceManifestVersion(content: string, newVersion: string): string {
  return content.replace(VERSION_LINE, (_line, _old: string, cr: string) => `version = "${newVersion}"${cr}`)
}

/**
 * Rewrite the version lines in place and read the file back.
 * Returns every version now on disk, which the caller compares to the requested one.
 */
export function writeManifestVersion(filePath: string, newVersion: string): string[] {
  const content = readFileSync(filePath, 'utf-8')
  writeFileSync(filePath, replaceManifestVersion(content, newVersion), 'utf-8')
  return getManifestVersions(readFileSync(filePath, 'utf-8'))
}
