export { FileBackup } from './backup'
export type { BackupStatus } from './backup'
export {
  buildPackage,
  checkTools,
  cleanBuildOutput,
  collectArtifacts,
  findUnsafeCleanTarget,
  formatPublishCommand,
  listArtifacts,
  publishPackage,
  shellRunner,
} from './commands'
export { defaultConfig, defineConfig, loadReleaseConfig, mergeConfig } from './config'
export { autoConfirmer, createPromptConfirmer, isAffirmative } from './confirm'
export * from './errors'
export { getManifestName, getManifestVersion, getManifestVersions, readManifest, replaceManifestVersion, writeManifestVersion } from './manifest'
export { release, ReleaseTransaction } from './release'
export * from './types'
export { isValidVersion, VERSION_PATTERN } from './utils'
