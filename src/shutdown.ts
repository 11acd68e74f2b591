/**
 * One-shot stop request shared by the listener and the console. Once
 * requested it stays requested.
 */
export class ShutdownCoordinator {
  private readonly controller = new AbortController();
  private _reason: string | undefined;

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get requested(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): string | undefined {
    return this._reason;
  }

  /**
   * Returns true for the call that actually requested the shutdown.
   */
  request(reason: string): boolean {
    if (this.requested) {
      return false;
    }
    this._reason = reason;
    this.controller.abort(reason);
    return true;
  }
}
