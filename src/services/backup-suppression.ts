/**
 * Global flags that pause change tracking and scheduling.
 * `restoring` is written only by the restore orchestrator, `wiping` only by
 * the wallet-wipe flow.
 */
export class BackupSuppression {
  #restoring = false;
  #wiping = false;

  get isRestoring(): boolean {
    return this.#restoring;
  }

  get isWiping(): boolean {
    return this.#wiping;
  }

  isSuppressed(): boolean {
    return this.#restoring || this.#wiping;
  }

  setRestoring(value: boolean): void {
    this.#restoring = value;
  }

  setWiping(value: boolean): void {
    this.#wiping = value;
  }
}
