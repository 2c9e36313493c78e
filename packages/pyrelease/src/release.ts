import type { CommandRunner, Confirmer, ManifestInfo, ProgressCallback, ReleaseConfig, ReleaseOptions, ReleaseResult, ReleaseStatus } from './types'
import type { Logger } from './utils'
import { basename, relative, resolve } from 'node:path'
import process from 'node:process'
import { FileBackup } from './backup'
import {
  buildPackage,
  checkTools,
  cleanBuildOutput,
  collectArtifacts,
  findUnsafeCleanTarget,
  formatPublishCommand,
  publishPackage,
  shellRunner,
} from './commands'
import { defaultConfig, mergeConfig } from './config'
import { createPromptConfirmer } from './confirm'
import { InputError, isReleaseError, MutationError, PreconditionError, PublishError, toError } from './errors'
import { checkInterruption, InterruptedError } from './interrupt'
import { readManifest, writeManifestVersion } from './manifest'
import { ExitCode, ProgressEvent, ReleaseState } from './types'
import { colors, createLogger, isValidVersion } from './utils'

/**
 * One release of one manifest: validate, confirm, bump, clean, build, confirm, publish.
 * Once the backup exists, every failure restores the manifest before the run ends.
 */
export class ReleaseTransaction {
  readonly config: ReleaseConfig
  readonly version: string
  readonly cwd: string
  readonly manifestPath: string
  readonly distPath: string
  readonly backup: FileBackup

  private readonly runner: CommandRunner
  private readonly confirmer: Confirmer
  private readonly progress?: ProgressCallback
  private readonly log: Logger

  private current: ReleaseState = ReleaseState.Init
  private oldVersion?: string
  private packageName?: string
  private artifacts: string[] = []

  constructor(options: ReleaseOptions) {
    const { version, runner, confirmer, progress, ...overrides } = options

    this.config = mergeConfig(defaultConfig, overrides)
    this.version = version
    this.cwd = resolve(this.config.cwd ?? process.cwd())
    this.manifestPath = resolve(this.cwd, this.config.manifest)
    this.distPath = resolve(this.cwd, this.config.distDir)
    this.backup = new FileBackup(this.manifestPath)
    this.runner = runner ?? shellRunner
    this.confirmer = confirmer ?? createPromptConfirmer()
    this.progress = progress
    this.log = createLogger({ quiet: this.config.quiet, dryRun: this.config.dryRun })
  }

  get state(): ReleaseState {
    return this.current
  }

  async run(): Promise<ReleaseResult> {
    try {
      const manifest = this.validate()
      this.preflight()

      this.log.info(`Current version: ${manifest.version}`)
      this.log.info(`New version: ${this.version}`)

      if (!(await this.confirmStart()))
        return this.finish('cancelled', ReleaseState.Cancelled)

      if (this.config.dryRun) {
        this.describePlan()
        return this.finish('dry-run', this.current)
      }

      this.createBackup()
      this.updateVersion()
      this.clean()
      this.build()

      if (!(await this.confirmPublish())) {
        this.backup.discard()
        this.log.warn(`Upload cancelled. Build artifacts remain in ${this.displayDist}/`)
        this.log.info(`You can upload manually later with: ${this.publishCommand}`)
        return this.finish('cancelled-after-build', ReleaseState.CancelledAfterBuild)
      }

      this.publish()
      this.printSummary()
      return this.finish('published', ReleaseState.Published)
    }
    catch (error) {
      return this.fail(toError(error))
    }
  }

  /**
   * Restore the manifest right away, e.g. from a signal handler.
   * Returns whether a restore happened.
   */
  abort(): boolean {
    const restored = this.backup.restore()
    if (restored)
      this.current = ReleaseState.RolledBack
    return restored
  }

  private get displayDist(): string {
    return relative(this.cwd, this.distPath) || '.'
  }

  private get cleanTargets(): string[] {
    return [this.config.distDir, ...this.config.cleanPaths]
  }

  private get publishCommand(): string {
    return formatPublishCommand(this.config.publishCommand, this.displayDist)
  }

  private validate(): ManifestInfo {
    if (!this.version) {
      throw new InputError('No version number provided!', { hint: 'Usage: pyrelease <version>, e.g. pyrelease 1.0.5' })
    }

    if (!isValidVersion(this.version)) {
      throw new InputError('Invalid version format! Use semantic versioning (e.g., 1.0.5)')
    }

    const manifest = readManifest(this.manifestPath)
    if (!manifest.version) {
      throw new PreconditionError(`Could not determine current version from ${this.config.manifest}`, {
        hint: 'The manifest needs a line like: version = "1.0.0"',
      })
    }

    const unsafe = findUnsafeCleanTarget(this.cwd, this.cleanTargets, [this.manifestPath, this.backup.path])
    if (unsafe !== undefined) {
      throw new PreconditionError(`Refusing to clean ${unsafe}: it contains the project or its manifest`, {
        hint: 'Point --dist-dir and cleanPaths at build output inside the project directory',
      })
    }

    this.oldVersion = manifest.version
    this.packageName = this.config.packageName ?? manifest.name ?? basename(this.cwd)
    this.current = ReleaseState.Validated
    return manifest
  }

  private preflight(): void {
    this.log.step('Checking required tools...')
    checkTools(this.runner, this.config.toolChecks, this.cwd)
    this.log.success('All required tools are available')
    this.emit(ProgressEvent.ToolsChecked)
  }

  private async confirmStart(): Promise<boolean> {
    if (this.config.confirm && !this.config.dryRun) {
      this.log.line()
      const confirmed = await this.confirmer.confirm(`Do you want to deploy version ${this.version}?`)
      checkInterruption()
      if (!confirmed) {
        this.log.warn('Deployment cancelled')
        return false
      }
    }

    this.current = ReleaseState.Confirmed
    return true
  }

  private describePlan(): void {
    this.log.step(`Would back up ${this.config.manifest} to ${basename(this.backup.path)}`)
    this.log.step(`Would update version: ${this.oldVersion} → ${this.version}`)
    this.log.step(`Would clean ${this.displayDist}/, build/ and *.egg-info/`)
    this.log.step(`Would run: ${this.config.buildCommand}`)
    this.log.step(`Would run: ${this.publishCommand}`)
  }

  private createBackup(): void {
    checkInterruption()
    this.log.step(`Creating backup of ${this.config.manifest}...`)
    this.backup.create()
    this.current = ReleaseState.BackedUp
    this.log.success(`Backup created: ${basename(this.backup.path)}`)
    this.emit(ProgressEvent.BackupCreated)
  }

  private updateVersion(): void {
    checkInterruption()
    this.log.step(`Updating version in ${this.config.manifest}...`)
    const written = writeManifestVersion(this.manifestPath, this.version)
    const stale = written.find(v => v !== this.version)
    if (written.length === 0 || stale !== undefined) {
      throw new MutationError(`Failed to update version in ${this.config.manifest}`, {
        hint: `Read back ${stale ?? 'no version'} instead of ${this.version}`,
      })
    }
    this.current = ReleaseState.VersionUpdated
    this.log.success(`Version updated: ${this.oldVersion} → ${this.version}`)
    this.emit(ProgressEvent.VersionUpdated)
  }

  private clean(): void {
    checkInterruption()
    this.log.step('Cleaning up build artifacts...')
    const removed = cleanBuildOutput(this.cwd, this.cleanTargets)
    this.current = ReleaseState.Cleaned
    this.log.success('Build artifacts cleaned')
    this.emit(ProgressEvent.Cleaned, removed.map(p => relative(this.cwd, p)).join(', '))
  }

  private build(): void {
    checkInterruption()
    this.log.step('Building package...')
    buildPackage(this.runner, this.config.buildCommand, this.cwd)
    this.artifacts = collectArtifacts(this.distPath, this.displayDist)
    this.current = ReleaseState.Built
    this.log.success('Package built successfully')

    this.log.info('Built files:')
    for (const artifact of this.artifacts)
      this.log.line(`  ${artifact}`)
    this.emit(ProgressEvent.Built)
  }

  private async confirmPublish(): Promise<boolean> {
    checkInterruption()
    if (!this.config.confirm)
      return true

    this.log.line()
    this.log.warn(`About to upload to ${this.config.registryName}. Make sure you have:`)
    this.log.warn(`1. Configured your ${this.config.registryName} credentials (~/.pypirc or environment variables)`)
    this.log.warn('2. Tested the package locally')
    this.log.warn('3. Updated documentation and changelog')
    this.log.line()

    const confirmed = await this.confirmer.confirm(`Continue with ${this.config.registryName} upload?`)
    checkInterruption()
    return confirmed
  }

  private publish(): void {
    this.log.step(`Uploading to ${this.config.registryName}...`)
    publishPackage(this.runner, this.publishCommand, this.config.registryName, this.cwd)
    this.backup.discard()
    this.current = ReleaseState.Published
    this.log.success(`Successfully deployed version ${this.version} to ${this.config.registryName}!`)
    this.emit(ProgressEvent.Published)
  }

  private printSummary(): void {
    this.log.line()
    this.log.info('Deployment Summary:')
    this.log.info(`  Package: ${this.packageName}`)
    this.log.info(`  Version: ${this.version}`)
    this.log.info(`  Previous: ${this.oldVersion}`)
    this.log.info(`  Status: ${colors.green(`Published to ${this.config.registryName}`)}`)

    this.log.line()
    this.log.info('Next steps:')
    this.log.info(`1. Tag the release: git tag v${this.version} && git push origin v${this.version}`)
    this.log.info('2. Create GitHub release with changelog')
    this.log.info('3. Update documentation if needed')
  }

  private fail(error: Error): ReleaseResult {
    if (error instanceof InterruptedError)
      this.log.warn('Deployment interrupted by user')
    else
      this.log.error(error.message)

    if (isReleaseError(error) && error.hint)
      this.log.info(error.hint)

    // abort() may already have restored it from a signal handler
    let restored = this.backup.status === 'restored'
    if (this.backup.isActive) {
      this.log.info('Restoring backup...')
      try {
        restored = this.abort()
      }
      catch (restoreError) {
        this.log.error(`Failed to restore ${this.config.manifest}: ${toError(restoreError).message}`)
        this.log.warn(`Your original manifest is still at ${this.backup.path}`)
      }
    }

    if (restored) {
      this.log.success(`Restored ${this.config.manifest} to version ${this.oldVersion}`)
      this.emit(ProgressEvent.RolledBack)
    }

    if (error instanceof PublishError)
      this.log.warn(`Build artifacts remain in ${this.displayDist}/ for manual inspection`)

    return this.finish(restored ? 'rolled-back' : 'failed', this.current, error)
  }

  private finish(status: ReleaseStatus, state: ReleaseState, error?: Error): ReleaseResult {
    this.current = state
    return {
      status,
      state,
      exitCode: error ? ExitCode.Failure : ExitCode.Success,
      oldVersion: this.oldVersion,
      newVersion: this.version,
      packageName: this.packageName,
      artifacts: this.artifacts,
      error,
    }
  }

  private emit(event: ProgressEvent, detail?: string): void {
    this.progress?.({
      event,
      oldVersion: this.oldVersion,
      newVersion: this.version,
      artifacts: this.artifacts,
      detail,
    })
  }
}

/**
 * Run a release to completion. Never throws for release failures; read `exitCode` and `error`.
 */
export async function release(options: ReleaseOptions): Promise<ReleaseResult> {
  return new ReleaseTransaction(options).run()
}
