import { GatewayError } from '@ai-relay/domain';

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Per-call abort scope. Fires when the caller's signal aborts, when the
 * timeout elapses (reason: a `timeout` GatewayError) or when `abort` is
 * called directly. `dispose` must run once the call is over.
 */
export class CancellationScope {
  private readonly controller = new AbortController();
  private readonly timer?: NodeJS.Timeout;

  constructor(
    private readonly parent: AbortSignal,
    timeoutMs: number,
  ) {
    if (timeoutMs > MAX_TIMEOUT_MS) {
      throw new RangeError(`timeout of ${timeoutMs}ms exceeds the ${MAX_TIMEOUT_MS}ms timer limit`);
    }
    if (parent.aborted) {
      this.controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', this.onParentAbort, { once: true });
    }

    if (timeoutMs > 0) {
      this.timer = setTimeout(() => {
        this.controller.abort(new GatewayError('timeout', `Upstream call timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      this.timer.unref();
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  abort(reason?: unknown): void {
    this.controller.abort(reason);
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.parent.removeEventListener('abort', this.onParentAbort);
  }

  private readonly onParentAbort = (): void => {
    this.controller.abort(this.parent.reason);
  };
}
