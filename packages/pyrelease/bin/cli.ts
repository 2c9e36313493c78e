#!/usr/bin/env tsx
import type { ReleaseConfigOptions, ReleaseProgress } from '../src/types'
import process from 'node:process'
import { CLI } from '@stacksjs/clapp'
import { version as toolVersion } from '../package.json'
import { defaultConfig, loadReleaseConfig } from '../src/config'
import { isReleaseError } from '../src/errors'
import { userInterrupted } from '../src/interrupt'
import { ReleaseTransaction } from '../src/release'
import { ExitCode, ProgressEvent } from '../src/types'
import { colors, symbols } from '../src/utils'

let activeTransaction: ReleaseTransaction | undefined

// Ctrl+C outside a prompt: put the manifest back before leaving
process.on('SIGINT', () => {
  userInterrupted.value = true
  const restored = activeTransaction?.abort() ?? false
  process.stderr.write(`\nRelease interrupted by user \x1B[3m(Ctrl+C)\x1B[0m${restored ? ', manifest restored' : ''}\n`)
  process.exit(ExitCode.Failure)
})

const cli = new CLI('pyrelease')

interface CLIOptions {
  manifest?: string
  distDir?: string
  cwd?: string
  buildCommand?: string
  publishCommand?: string
  packageName?: string
  yes?: boolean
  dryRun?: boolean
  quiet?: boolean
  verbose?: boolean
}

/**
 * Progress callback for CLI output
 */
function progress({ event, artifacts, detail }: ReleaseProgress): void {
  switch (event) {
    case ProgressEvent.ToolsChecked:
      console.log(colors.gray(`${symbols.checkmark} Tool preflight`))
      break

    case ProgressEvent.Cleaned:
      console.log(colors.gray(`${symbols.checkmark} Removed ${detail || 'nothing'}`))
      break

    case ProgressEvent.Built:
      console.log(colors.gray(`${symbols.checkmark} ${artifacts.length} artifact(s) built`))
      break

    case ProgressEvent.RolledBack:
      console.log(colors.gray(`${symbols.checkmark} Manifest restored`))
      break
  }
}

/**
 * Error handler for failures outside the release itself, e.g. a broken config file
 */
function errorHandler(error: Error): never {
  let message = error.message || String(error)

  if (process.env.CI || process.env.DEBUG)
    message += `\n\n${error.stack || ''}`

  console.error(colors.red(`${symbols.error} ${message}`))
  if (isReleaseError(error) && error.hint)
    console.error(error.hint)

  process.exit(ExitCode.Failure)
}

function toOverrides(options: CLIOptions): ReleaseConfigOptions {
  const overrides: ReleaseConfigOptions = {}

  if (options.manifest !== undefined)
    overrides.manifest = options.manifest
  if (options.distDir !== undefined)
    overrides.distDir = options.distDir
  if (options.cwd !== undefined)
    overrides.cwd = options.cwd
  if (options.buildCommand !== undefined)
    overrides.buildCommand = options.buildCommand
  if (options.publishCommand !== undefined)
    overrides.publishCommand = options.publishCommand
  if (options.packageName !== undefined)
    overrides.packageName = options.packageName
  if (options.yes !== undefined)
    overrides.confirm = !options.yes
  if (options.dryRun !== undefined)
    overrides.dryRun = options.dryRun
  if (options.quiet !== undefined)
    overrides.quiet = options.quiet
  if (options.verbose !== undefined)
    overrides.verbose = options.verbose

  return overrides
}

cli
  .command('[version]', 'Bump pyproject.toml, build and upload the package')
  .option('--manifest <path>', `Manifest to update (default: ${defaultConfig.manifest})`)
  .option('--dist-dir <dir>', `Build output directory (default: ${defaultConfig.distDir})`)
  .option('--cwd <dir>', 'Project directory')
  .option('--build-command <cmd>', `Build command (default: ${defaultConfig.buildCommand})`)
  .option('--publish-command <cmd>', `Upload command, {distDir} is substituted (default: ${defaultConfig.publishCommand})`)
  .option('--package-name <name>', 'Package name shown in the summary')
  .option('-y, --yes', 'Skip both confirmations')
  .option('--dry-run', 'Check everything and show the plan without changing files')
  .option('-q, --quiet', 'Only print warnings and errors')
  .option('--verbose', 'Print every stage as it completes')
  .example('pyrelease 1.0.5')
  .example('pyrelease 1.0.5 --dry-run')
  .example('pyrelease 2.0.0 --publish-command "python -m twine upload -r testpypi {distDir}/*"')
  .action(async (version: string | undefined, options: CLIOptions) => {
    try {
      const config = await loadReleaseConfig(toOverrides(options))

      activeTransaction = new ReleaseTransaction({
        ...config,
        version: version ?? '',
        progress: config.verbose && !config.quiet ? progress : undefined,
      })

      const result = await activeTransaction.run()
      activeTransaction = undefined
      process.exit(result.exitCode)
    }
    catch (error) {
      errorHandler(error instanceof Error ? error : new Error(String(error)))
    }
  })

cli
  .command('version', 'Show the version of pyrelease')
  .action(() => {
    console.log(toolVersion)
  })

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:')
  errorHandler(reason instanceof Error ? reason : new Error(String(reason)))
})

cli.version(toolVersion)
cli.help()
cli.parse()
