/**
 * One composite call: fan-out, settlement and merge
 */
import type {
  ErrorDetail,
  ProviderFailure,
  ProviderResult,
  ProviderSuccess,
  ProviderTarget,
  RequestEnvelope,
} from '@llm-dispatch/fetch-client';
import type { ResolvedProxy } from '@llm-dispatch/fetch-proxy-config';
import { createLogger } from '@llm-dispatch/logger';
import type {
  BodyMerger,
  CompositeCallState,
  CompositeEndEvent,
  CompositeResult,
  MergePolicy,
} from './types.mjs';
import { AllProvidersFailedError, PartialFailureError } from './errors.mjs';
import { emitCompositeEnd } from './diagnostics.mjs';

const log = createLogger('composite-dispatcher.call');

const NO_PROXY: ResolvedProxy = Object.freeze<ResolvedProxy>({
  url: null,
  source: 'none',
  trustEnv: true,
});

const NEXT_STATE: ReadonlyMap<CompositeCallState, CompositeCallState> = new Map<
  CompositeCallState,
  CompositeCallState
>([
  ['pending', 'in-flight'],
  ['in-flight', 'merging'],
  ['merging', 'done'],
]);

type Settlement =
  | { kind: 'winner'; index: number; result: ProviderSuccess }
  | { kind: 'all-settled' }
  | { kind: 'deadline' }
  | { kind: 'aborted'; message: string };

export interface CompositeCallOptions {
  callId: string;
  policy: MergePolicy;
  targets: readonly ProviderTarget[];
  merger: BodyMerger;
  deadlineMs?: number;
  signal?: AbortSignal;
}

function reasonMessage(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.message;
  }
  return typeof reason === 'string' ? reason : 'Composite call aborted';
}

/**
 * Runs `pending → in-flight → merging → done` once.
 *
 * Every target gets its own AbortController; whatever is still in flight
 * when the call settles is aborted and recorded as a `cancelled` result.
 */
export class CompositeCall {
  private current: CompositeCallState = 'pending';
  private readonly startedAt = Date.now();
  private readonly results: (ProviderResult | undefined)[];
  private readonly controllers: AbortController[];

  constructor(
    private readonly envelope: RequestEnvelope,
    private readonly options: CompositeCallOptions
  ) {
    this.results = options.targets.map(() => undefined);
    this.controllers = options.targets.map(() => new AbortController());
  }

  get state(): CompositeCallState {
    return this.current;
  }

  get callId(): string {
    return this.options.callId;
  }

  async run(): Promise<CompositeResult> {
    this.transition('in-flight');
    const settlement = await this.fanOut();

    this.transition('merging');
    const results = this.cancelOutstanding(settlement);
    const outcome = this.evaluate(settlement, results);
    this.transition('done');

    if (outcome instanceof Error) {
      this.report(outcome instanceof PartialFailureError ? 'partial-failure' : 'all-failed', results);
      log.warn(
        { callId: this.options.callId, policy: this.options.policy, failedProviderIds: outcome.failedProviderIds },
        outcome.message
      );
      throw outcome;
    }

    this.report(outcome.deadlineExceeded ? 'deadline-exceeded' : 'ok', results, outcome.winner);
    return outcome;
  }

  /**
   * Apply the merge policy to the settled results
   */
  private evaluate(
    settlement: Settlement,
    results: ProviderResult[]
  ): CompositeResult | PartialFailureError | AllProvidersFailedError {
    const { policy, callId, merger } = this.options;
    const successes = results.filter((result): result is ProviderSuccess => result.status === 'ok');

    if (settlement.kind === 'winner') {
      return this.complete(results, settlement.result.body, false, settlement.result.providerId);
    }
    if (settlement.kind === 'deadline') {
      const mergedBody = policy === 'best-effort' && successes.length > 0 ? merger(successes, callId) : null;
      return this.complete(results, mergedBody, true);
    }
    if (policy === 'all-required' && successes.length < results.length) {
      return new PartialFailureError(callId, results);
    }
    if (successes.length === 0) {
      return new AllProvidersFailedError(callId, results);
    }
    return this.complete(results, merger(successes, callId), false);
  }

  private transition(to: CompositeCallState): void {
    if (NEXT_STATE.get(this.current) !== to) {
      throw new Error(`Invalid composite call transition: ${this.current} -> ${to}`);
    }
    log.debug({ callId: this.options.callId, from: this.current, to }, 'Composite call state');
    this.current = to;
  }

  private fanOut(): Promise<Settlement> {
    const { targets, policy, deadlineMs, signal } = this.options;

    return new Promise((resolve) => {
      let settled = false;
      let remaining = targets.length;
      let timer: NodeJS.Timeout | undefined;

      const onAbort = (): void => {
        settle({ kind: 'aborted', message: reasonMessage(signal?.reason) });
      };

      const settle = (settlement: Settlement): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(settlement);
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      if (deadlineMs !== undefined) {
        timer = setTimeout(() => settle({ kind: 'deadline' }), deadlineMs);
      }

      targets.forEach((target, index) => {
        void this.invoke(target, index).then((result) => {
          if (settled) return;
          this.results[index] = result;
          remaining--;
          if (policy === 'first-success' && result.status === 'ok') {
            settle({ kind: 'winner', index, result });
          } else if (remaining === 0) {
            settle({ kind: 'all-settled' });
          }
        });
      });
    });
  }

  /**
   * Call one target; a target that throws becomes an `unknown` failure
   */
  private async invoke(target: ProviderTarget, index: number): Promise<ProviderResult> {
    const startedAt = Date.now();
    try {
      return await target.send(this.envelope, { signal: this.controllers[index].signal });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ callId: this.options.callId, providerId: target.providerId, err: error }, 'Provider target threw');
      return this.failure(target, { kind: 'unknown', message }, Date.now() - startedAt);
    }
  }

  /**
   * Abort every unsettled target and record it as cancelled
   */
  private cancelOutstanding(settlement: Settlement): ProviderResult[] {
    const message = this.cancelMessage(settlement);
    const latencyMs = Date.now() - this.startedAt;

    return this.options.targets.map((target, index) => {
      const result = this.results[index];
      if (result) {
        return result;
      }
      this.controllers[index].abort(new Error(message));
      return this.failure(target, { kind: 'cancelled', message }, latencyMs);
    });
  }

  private cancelMessage(settlement: Settlement): string {
    switch (settlement.kind) {
      case 'winner':
        return `Cancelled: ${this.options.targets[settlement.index].providerId} succeeded first`;
      case 'deadline':
        return `Composite deadline of ${this.options.deadlineMs}ms exceeded`;
      case 'aborted':
        return settlement.message;
      case 'all-settled':
        return 'Cancelled';
    }
  }

  private failure(target: ProviderTarget, detail: ErrorDetail, latencyMs: number): ProviderFailure {
    return {
      status: 'error',
      providerId: target.providerId,
      body: detail,
      latencyMs,
      proxy: target.proxy ?? NO_PROXY,
    };
  }

  private complete(
    results: ProviderResult[],
    mergedBody: CompositeResult['mergedBody'],
    deadlineExceeded: boolean,
    winner?: string
  ): CompositeResult {
    return {
      callId: this.options.callId,
      policy: this.options.policy,
      state: 'done',
      results,
      mergedBody,
      ...(winner !== undefined && { winner }),
      deadlineExceeded,
      durationMs: Date.now() - this.startedAt,
    };
  }

  private report(outcome: CompositeEndEvent['outcome'], results: ProviderResult[], winner?: string): void {
    const succeeded = results.filter((result) => result.status === 'ok').length;
    const event: CompositeEndEvent = {
      callId: this.options.callId,
      policy: this.options.policy,
      providerIds: results.map((result) => result.providerId),
      outcome,
      succeeded,
      failed: results.length - succeeded,
      ...(winner !== undefined && { winner }),
      durationMs: Date.now() - this.startedAt,
      timestamp: Date.now(),
    };
    emitCompositeEnd(event);
    if (outcome === 'ok') {
      log.info(event, `Composite call ${event.callId}: ok`);
    } else if (outcome === 'deadline-exceeded') {
      log.warn(event, `Composite call ${event.callId}: deadline exceeded`);
    }
  }
}
