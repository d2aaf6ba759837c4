/**
 * Per-call deadline and cancellation
 */

export type CallOutcome = 'timeout' | 'cancelled';

function reasonMessage(reason: unknown): string {
  if (reason instanceof Error) return reason.message;
  if (typeof reason === 'string' && reason) return reason;
  return 'Request cancelled';
}

/**
 * One AbortSignal that fires on the call's hard deadline or when the
 * caller's signal aborts, remembering which of the two happened first.
 */
export class CallDeadline {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly parent?: AbortSignal;
  private outcomeKind?: CallOutcome;
  private outcomeMessage = '';

  constructor(timeoutMs: number, parent?: AbortSignal) {
    this.timer = setTimeout(
      () => this.abort('timeout', `Request timed out after ${timeoutMs}ms`),
      timeoutMs
    );
    this.parent = parent;
    if (parent?.aborted) {
      this.onParentAbort();
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get outcome(): CallOutcome | undefined {
    return this.outcomeKind;
  }

  get message(): string {
    return this.outcomeMessage;
  }

  /**
   * Abort the call as cancelled
   */
  cancel(message: string): void {
    this.abort('cancelled', message);
  }

  /**
   * Clear the timer and detach from the caller's signal
   */
  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  private readonly onParentAbort = (): void => {
    this.abort('cancelled', reasonMessage(this.parent?.reason));
  };

  private abort(kind: CallOutcome, message: string): void {
    if (this.outcomeKind) return;
    this.outcomeKind = kind;
    this.outcomeMessage = message;
    clearTimeout(this.timer);
    this.controller.abort(new Error(message));
  }
}
