import type { ReleaseConfig, ReleaseConfigOptions } from './types'
import { loadConfig } from 'bunfig'

export const defaultConfig: ReleaseConfig = {
  // Project layout
  manifest: 'pyproject.toml',
  distDir: 'dist',
  cleanPaths: ['build'],

  // External tools
  buildCommand: 'python -m build',
  publishCommand: 'python -m twine upload {distDir}/*',
  toolChecks: [
    { name: 'Python', command: 'python --version' },
    { name: 'python build module', command: 'python -c "import build"', hint: 'Install with: pip install build' },
    { name: 'twine', command: 'python -c "import twine"', hint: 'Install with: pip install twine' },
  ],
  registryName: 'PyPI',

  // UI options
  confirm: true,
  dryRun: false,
  quiet: false,
  verbose: false,
}

let cachedConfig: ReleaseConfig | null = null

async function getConfig(): Promise<ReleaseConfig> {
  if (cachedConfig)
    return cachedConfig

  const loaded = await loadConfig({
    name: 'pyrelease',
    defaultConfig,
  })

  cachedConfig = { ...defaultConfig, ...loaded }
  return cachedConfig
}

/**
 * Layer overrides on a config. Keys set to `undefined` keep the base value.
 */
export function mergeConfig(base: ReleaseConfig, overrides: ReleaseConfigOptions = {}): ReleaseConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  )
  return { ...base, ...defined }
}

/**
 * Defaults, then `pyrelease.config.*`, then the overrides
 */
export async function loadReleaseConfig(overrides: ReleaseConfigOptions = {}): Promise<ReleaseConfig> {
  const base = await getConfig()
  return mergeConfig({ ...defaultConfig, ...base }, overrides)
}

/**
 * Drop the cached config file contents, e.g. after changing directory
 */
export function resetConfigCache(): void {
  cachedConfig = null
}

/**
 * Define configuration helper for TypeScript config files
 */
export function defineConfig(config: ReleaseConfigOptions): ReleaseConfigOptions {
  return config
}
