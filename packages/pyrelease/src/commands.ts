import type { CommandResult, CommandRunner, RunCommandOptions, ToolCheck } from './types'
import { spawnSync } from 'node:child_process'
import { existsSync, readdirSync, rmSync } from 'node:fs'
import { isAbsolute, join, relative, resolve, sep } from 'node:path'
import process from 'node:process'
import { BuildError, PreconditionError, PublishError } from './errors'

/**
 * Runs commands through the system shell so globs like `dist/*` expand.
 * Blocks until the command exits; there is no timeout.
 */
export const shellRunner: CommandRunner = {
  run(command: string, options: RunCommandOptions = {}): CommandResult {
    const result = spawnSync(command, {
      shell: true,
      encoding: 'utf-8',
      cwd: options.cwd ?? process.cwd(),
      stdio: options.capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
    })

    if (result.error) {
      return { status: 127, stdout: '', stderr: result.error.message }
    }

    return {
      // killed by a signal
      status: result.status ?? 1,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
    }
  },
}

/**
 * Run every tool check and stop at the first one that fails
 */
export function checkTools(runner: CommandRunner, checks: ToolCheck[], cwd?: string): void {
  for (const check of checks) {
    const result = runner.run(check.command, { cwd, capture: true })
    if (result.status !== 0) {
      throw new PreconditionError(`${check.name} is not installed or not in PATH`, { hint: check.hint })
    }
  }
}

function contains(dir: string, path: string): boolean {
  const rel = relative(dir, path)
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel))
}

/**
 * First clean path that would take `cwd`, one of its parents, or a kept file with it
 */
export function findUnsafeCleanTarget(cwd: string, paths: string[], keep: string[]): string | undefined {
  return paths.find((p) => {
    const target = resolve(cwd, p)
    return contains(target, cwd) || keep.some(file => contains(target, resolve(cwd, file)))
  })
}

/**
 * Remove previous build output. Paths that do not exist are skipped.
 */
export function cleanBuildOutput(cwd: string, paths: string[]): string[] {
  const targets = new Set(paths.map(p => resolve(cwd, p)))

  if (existsSync(cwd)) {
    for (const entry of readdirSync(cwd)) {
      if (entry.endsWith('.egg-info'))
        targets.add(join(cwd, entry))
    }
  }

  const removed: string[] = []
  for (const target of targets) {
    if (!existsSync(target))
      continue
    rmSync(target, { recursive: true, force: true })
    removed.push(target)
  }

  return removed
}

/**
 * File names in the output directory, sorted
 */
export function listArtifacts(distDir: string): string[] {
  if (!existsSync(distDir))
    return []

  return readdirSync(distDir).sort()
}

export function buildPackage(runner: CommandRunner, command: string, cwd?: string): void {
  const result = runner.run(command, { cwd })
  if (result.status !== 0) {
    throw new BuildError('Build failed!', {
      hint: `\`${command}\` exited with code ${result.status}`,
    })
  }
}

/**
 * Artifact set produced by the build; an empty set fails the build stage
 */
export function collectArtifacts(distDir: string, displayDir = distDir): string[] {
  const artifacts = listArtifacts(distDir)
  if (artifacts.length === 0) {
    throw new BuildError(`No files found in ${displayDir}/ directory after build`)
  }
  return artifacts
}

/**
 * Fill `{distDir}` in a publish command template
 */
export function formatPublishCommand(template: string, distDir: string): string {
  return template.replace(/\{distDir\}/g, distDir)
}

export function publishPackage(runner: CommandRunner, command: string, registryName: string, cwd?: string): void {
  const result = runner.run(command, { cwd })
  if (result.status !== 0) {
    throw new PublishError(`Upload to ${registryName} failed!`, {
      hint: `\`${command}\` exited with code ${result.status}`,
    })
  }
}
