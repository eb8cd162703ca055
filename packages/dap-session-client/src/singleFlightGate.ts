const noop = (): void => undefined;

export interface GateOptions {
  /**
   * Let the next call through as soon as this one is written instead of when
   * it settles. Only for commands whose response the debugger defers.
   */
  releaseOnIssue?: boolean;
}

/**
 * Serializes outgoing commands: a call is issued only after every call
 * admitted before it has settled, so at most one response is awaited at a
 * time.
 */
export class SingleFlightGate {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  public run<T>(
    issue: () => Promise<T>,
    options: GateOptions = {},
  ): Promise<T> {
    this.queued++;
    // Wrapped so the call's own promise is not flattened into `started`.
    const started = this.tail.then(() => ({ call: issue() }));
    const result = started.then(({ call }) => call);

    const settled = options.releaseOnIssue
      ? started.then(noop, noop)
      : result.then(noop, noop);
    this.tail = settled.then(() => {
      this.queued--;
    });
    return result;
  }

  /** Calls admitted and not yet released. */
  get depth(): number {
    return this.queued;
  }
}
