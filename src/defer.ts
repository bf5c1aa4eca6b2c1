/**
 * Scope-exit cleanups.
 *
 * ```ts
 * withDefer(scope => {
 *   const handle = open();
 *   scope.defer(() => handle.close());
 *   ...
 * }); // handle.close() runs here, also when the body throws
 * ```
 */
export class DeferScope {
  private pending: Array<() => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  defer(cleanup: () => void): void {
    if (this.closed) {
      throw new Error('Cannot defer on a closed scope');
    }
    this.pending.push(cleanup);
  }

  /**
   * Run every registered cleanup once, most recent first. All of them run even
   * when one throws; the first error is rethrown afterwards.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const cleanups = this.pending;
    this.pending = [];

    let failed = false;
    let firstError: unknown;
    for (let i = cleanups.length - 1; i >= 0; i--) {
      try {
        cleanups[i]();
      } catch (e) {
        if (!failed) {
          failed = true;
          firstError = e;
        }
      }
    }
    if (failed) throw firstError;
  }
}

export function withDefer<T>(body: (scope: DeferScope) => T): T {
  const scope = new DeferScope();
  try {
    return body(scope);
  } finally {
    scope.close();
  }
}
