import type { ReleaseConfigOptions } from './src/types'
import { defineConfig } from './src/config'

const config: ReleaseConfigOptions = defineConfig({
  // Project layout (these match the defaults)
  manifest: 'pyproject.toml',
  distDir: 'dist',

  // UI options
  confirm: true,
  quiet: false,

  // Example upload to the test index instead of PyPI
  // publishCommand: 'python -m twine upload -r testpypi {distDir}/*',
  // registryName: 'TestPyPI',

  // Example build with uv
  // buildCommand: 'uv build',
})

export default config
