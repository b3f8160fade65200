/**
 * Hands out dictation session tokens.
 *
 * A token stays current until a newer session begins or it is cancelled.
 * Callbacks capture the token of the session they belong to and check it
 * before touching the screen.
 */
export class SessionTracker {
  private latest = 0;
  private cancelled = false;

  begin(): number {
    this.latest += 1;
    this.cancelled = false;
    return this.latest;
  }

  isCurrent(token: number): boolean {
    return token === this.latest && !this.cancelled;
  }

  cancel(token: number): void {
    if (token === this.latest) {
      this.cancelled = true;
    }
  }

  get current(): number | null {
    return this.latest > 0 && !this.cancelled ? this.latest : null;
  }
}
