/**
 * Set-once disconnection flag shared by every stream monitor and the
 * supervision loop of a single run. There is no reset.
 */
export class DisconnectionSignal {
  private flagged = false;
  private firstSource: string | null = null;

  /**
   * Raise the flag. Idempotent.
   *
   * @param source - Tag of the setter, e.g. "video (stderr)".
   * @returns true only for the call that actually raised it.
   */
  set(source?: string): boolean {
    if (this.flagged) return false;
    this.flagged = true;
    this.firstSource = source ?? null;
    return true;
  }

  isSet(): boolean {
    return this.flagged;
  }

  /** Tag passed by the first setter, if any. */
  source(): string | null {
    return this.firstSource;
  }
}
