/**
 * Global flag to track user interrupt status
 */
export const userInterrupted = { value: false }

export class InterruptedError extends Error {
  constructor() {
    super('Release interrupted by user')
    this.name = 'InterruptedError'
  }
}

/**
 * Throw when the user pressed Ctrl+C since the last stage, so the release rolls back
 */
export function checkInterruption(): void {
  if (userInterrupted.value)
    throw new InterruptedError()
}
