import { copyFileSync, existsSync, rmSync } from 'node:fs'

export type BackupStatus = 'none' | 'created' | 'restored' | 'discarded'

/**
 * Single-use copy of a file taken before it is edited.
 * After `create` it is either restored or discarded, once.
 */
export class FileBackup {
  readonly path: string
  private current: BackupStatus = 'none'

  constructor(readonly target: string, suffix = '.backup') {
    this.path = `${target}${suffix}`
  }

  get status(): BackupStatus {
    return this.current
  }

  get isActive(): boolean {
    return this.current === 'created'
  }

  create(): void {
    if (this.current !== 'none')
      throw new Error(`Backup of ${this.target} was already taken`)

    copyFileSync(this.target, this.path)
    this.current = 'created'
  }

  /**
   * Copy the backup over the target and delete it. Returns false when there is nothing to restore.
   */
  restore(): boolean {
    if (!this.isActive)
      return false

    copyFileSync(this.path, this.target)
    rmSync(this.path, { force: true })
    this.current = 'restored'
    return true
  }

  /**
   * Delete the backup and keep the target as it is
   */
  discard(): boolean {
    if (!this.isActive)
      return false

    rmSync(this.path, { force: true })
    this.current = 'discarded'
    return true
  }

  exists(): boolean {
    return existsSync(this.path)
  }
}
