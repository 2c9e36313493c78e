import { ExitCode } from './types'

export type ReleaseErrorCode =
  | 'InputError'
  | 'PreconditionError'
  | 'MutationError'
  | 'BuildError'
  | 'PublishError'

export interface ReleaseErrorOptions {
  /**
   * Remediation printed after the message, e.g. an install command
   */
  hint?: string
  cause?: unknown
}

/**
 * Base class for every failure the release transaction reports to the operator.
 * None of them are retried.
 */
export class ReleaseError extends Error {
  readonly code: ReleaseErrorCode
  readonly hint?: string
  readonly exitCode: ExitCode = ExitCode.Failure

  constructor(code: ReleaseErrorCode, message: string, options: ReleaseErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = code
    this.hint = options.hint
  }
}

/**
 * Missing or malformed version argument
 */
export class InputError extends ReleaseError {
  constructor(message: string, options: ReleaseErrorOptions = {}) {
    super('InputError', message, options)
  }
}

/**
 * Missing manifest or missing tool
 */
export class PreconditionError extends ReleaseError {
  constructor(message: string, options: ReleaseErrorOptions = {}) {
    super('PreconditionError', message, options)
  }
}

/**
 * The manifest did not read back the requested version after the rewrite
 */
export class MutationError extends ReleaseError {
  constructor(message: string, options: ReleaseErrorOptions = {}) {
    super('MutationError', message, options)
  }
}

export class BuildError extends ReleaseError {
  constructor(message: string, options: ReleaseErrorOptions = {}) {
    super('BuildError', message, options)
  }
}

export class PublishError extends ReleaseError {
  constructor(message: string, options: ReleaseErrorOptions = {}) {
    super('PublishError', message, options)
  }
}

export function isReleaseError(error: unknown): error is ReleaseError {
  return error instanceof ReleaseError
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
