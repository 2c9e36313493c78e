export interface ToolCheck {
  /**
   * Human readable tool name, used in the preflight output
   */
  name: string

  /**
   * Shell command that must exit with 0 when the tool is available
   */
  command: string

  /**
   * Remediation shown when the check fails, e.g. an install command
   */
  hint?: string
}

export interface ReleaseConfig {
  /**
   * Project directory. Relative manifest and output paths resolve against it.
   */
  cwd?: string

  /**
   * Path of the manifest carrying the `version = "..."` line
   */
  manifest: string

  /**
   * Directory the build tool writes its artifacts to
   */
  distDir: string

  /**
   * Extra directories removed before the build, next to `distDir` and `*.egg-info`
   */
  cleanPaths: string[]

  buildCommand: string

  /**
   * Upload command. `{distDir}` is replaced by the output directory.
   */
  publishCommand: string

  toolChecks: ToolCheck[]

  /**
   * Registry name used in prompts and summaries
   */
  registryName: string

  /**
   * Package name for the summary. Read from the manifest when not set.
   */
  packageName?: string

  confirm: boolean
  dryRun: boolean
  quiet: boolean
  verbose: boolean
}

export type ReleaseConfigOptions = Partial<ReleaseConfig>

export interface ReleaseOptions extends ReleaseConfigOptions {
  version: string
  runner?: CommandRunner
  confirmer?: Confirmer
  progress?: ProgressCallback
}

export enum ReleaseState {
  Init = 'init',
  Validated = 'validated',
  Confirmed = 'confirmed',
  BackedUp = 'backed-up',
  VersionUpdated = 'version-updated',
  Cleaned = 'cleaned',
  Built = 'built',
  Published = 'published',
  Cancelled = 'cancelled',
  CancelledAfterBuild = 'cancelled-after-build',
  RolledBack = 'rolled-back',
}

export type ReleaseStatus = 'published' | 'cancelled' | 'cancelled-after-build' | 'rolled-back' | 'failed' | 'dry-run'

export interface ReleaseResult {
  status: ReleaseStatus
  /**
   * Last state the transaction reached before it ended
   */
  state: ReleaseState
  exitCode: ExitCode
  oldVersion?: string
  newVersion: string
  packageName?: string
  artifacts: string[]
  error?: Error
}

export enum ProgressEvent {
  ToolsChecked = 'toolsChecked',
  BackupCreated = 'backupCreated',
  VersionUpdated = 'versionUpdated',
  Cleaned = 'cleaned',
  Built = 'built',
  Published = 'published',
  RolledBack = 'rolledBack',
}

export interface ReleaseProgress {
  event: ProgressEvent
  oldVersion?: string
  newVersion: string
  artifacts: string[]
  detail?: string
}

export type ProgressCallback = (progress: ReleaseProgress) => void

export interface CommandResult {
  status: number
  stdout: string
  stderr: string
}

export interface RunCommandOptions {
  cwd?: string
  /**
   * Capture output instead of streaming it to the terminal
   */
  capture?: boolean
}

/**
 * Runs one shell command to completion. The adapters never spawn processes themselves.
 */
export interface CommandRunner {
  run: (command: string, options?: RunCommandOptions) => CommandResult
}

/**
 * Yes/no decision at a confirmation gate
 */
export interface Confirmer {
  confirm: (question: string) => Promise<boolean>
}

export interface ManifestInfo {
  version?: string
  name?: string
}

export enum ExitCode {
  Success = 0,
  Failure = 1,
}
