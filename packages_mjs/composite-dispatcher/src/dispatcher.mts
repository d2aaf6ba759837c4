/**
 * Fan one request out to several providers
 */
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '@llm-dispatch/logger';
import type { ProviderTarget, RequestEnvelope } from '@llm-dispatch/fetch-client';
import type {
  BodyMerger,
  CompositeDispatcherConfig,
  CompositeResult,
  DispatchOptions,
  MergePolicy,
  TargetSelector,
} from './types.mjs';
import { DuplicateProviderError, NoProviderConfiguredError, UnknownProviderError } from './errors.mjs';
import { CompositeCall } from './call.mjs';
import { defaultMerger } from './merge.mjs';

const log = createLogger('composite-dispatcher');

export const MERGE_POLICIES: readonly MergePolicy[] = ['first-success', 'all-required', 'best-effort'];

export const DEFAULT_MERGE_POLICY: MergePolicy = 'best-effort';

function validateDeadline(deadlineMs: number | undefined): void {
  if (deadlineMs !== undefined && (!Number.isFinite(deadlineMs) || deadlineMs <= 0)) {
    throw new RangeError(`deadlineMs must be a positive number, got ${deadlineMs}`);
  }
}

function validatePolicy(policy: string): void {
  if (!MERGE_POLICIES.some((known) => known === policy)) {
    throw new RangeError(`Invalid merge policy: ${policy}. Must be one of: ${MERGE_POLICIES.join(', ')}`);
  }
}

/**
 * Sends the same envelope to a set of provider targets and merges the
 * results according to a merge policy.
 *
 * Per-provider failures are data; only the policy turns them into a
 * rejected call.
 *
 * @example
 * const dispatcher = new CompositeDispatcher({ policy: 'first-success', deadlineMs: 20_000 });
 * dispatcher.register(primary).register(fallback);
 *
 * const { mergedBody, results } = await dispatcher.dispatch(envelope);
 * const onlyPrimary = await dispatcher.dispatch(envelope, ['primary']);
 */
export class CompositeDispatcher {
  private readonly registry = new Map<string, ProviderTarget>();
  private readonly policy: MergePolicy;
  private readonly deadlineMs?: number;
  private readonly merger: BodyMerger;

  constructor(config: CompositeDispatcherConfig = {}) {
    this.policy = config.policy ?? DEFAULT_MERGE_POLICY;
    validatePolicy(this.policy);
    validateDeadline(config.deadlineMs);
    this.deadlineMs = config.deadlineMs;
    this.merger = config.merger ?? defaultMerger;
    for (const target of config.targets ?? []) {
      this.register(target);
    }
  }

  /**
   * Registered provider ids, in registration order
   */
  get providerIds(): string[] {
    return [...this.registry.keys()];
  }

  get size(): number {
    return this.registry.size;
  }

  /**
   * @throws DuplicateProviderError if the id is taken
   */
  register(target: ProviderTarget): this {
    if (this.registry.has(target.providerId)) {
      throw new DuplicateProviderError(target.providerId);
    }
    this.registry.set(target.providerId, target);
    log.debug({ providerId: target.providerId }, 'Provider registered');
    return this;
  }

  unregister(providerId: string): boolean {
    return this.registry.delete(providerId);
  }

  getTarget(providerId: string): ProviderTarget | undefined {
    return this.registry.get(providerId);
  }

  /**
   * Dispatch one logical call
   *
   * @param targets - Subset by id or instance; all registered targets when omitted
   * @throws NoProviderConfiguredError when the target set is empty
   * @throws UnknownProviderError for an unregistered id
   * @throws PartialFailureError under all-required when any target failed
   * @throws AllProvidersFailedError under first-success or best-effort when none succeeded
   */
  async dispatch(
    envelope: RequestEnvelope,
    targets?: readonly TargetSelector[],
    options: DispatchOptions = {}
  ): Promise<CompositeResult> {
    const policy = options.policy ?? this.policy;
    validatePolicy(policy);
    const deadlineMs = options.deadlineMs ?? this.deadlineMs;
    validateDeadline(deadlineMs);

    const selected = this.selectTargets(targets);
    if (selected.length === 0) {
      throw new NoProviderConfiguredError();
    }

    const call = new CompositeCall(envelope, {
      callId: uuidv4(),
      policy,
      targets: selected,
      merger: this.merger,
      deadlineMs,
      signal: options.signal,
    });
    log.debug(
      { callId: call.callId, policy, deadlineMs, providerIds: selected.map((target) => target.providerId) },
      'Composite call started'
    );
    return call.run();
  }

  /**
   * Resolve selectors to targets: registered ones in registration order,
   * then unregistered instances in the order given
   *
   * @throws UnknownProviderError for an id that is not registered
   * @throws DuplicateProviderError when two selected targets share a providerId
   */
  selectTargets(selectors?: readonly TargetSelector[]): ProviderTarget[] {
    if (!selectors) {
      return [...this.registry.values()];
    }

    const chosen = new Set<ProviderTarget>();
    const unregistered: ProviderTarget[] = [];
    for (const selector of selectors) {
      if (typeof selector === 'string') {
        const target = this.registry.get(selector);
        if (!target) {
          throw new UnknownProviderError(selector);
        }
        chosen.add(target);
      } else if (this.registry.get(selector.providerId) === selector) {
        chosen.add(selector);
      } else if (!unregistered.includes(selector)) {
        unregistered.push(selector);
      }
    }

    const selected = [...[...this.registry.values()].filter((target) => chosen.has(target)), ...unregistered];
    const seen = new Set<string>();
    for (const { providerId } of selected) {
      if (seen.has(providerId)) {
        throw new DuplicateProviderError(providerId, `Provider id selected twice: ${providerId}`);
      }
      seen.add(providerId);
    }
    return selected;
  }

  /**
   * Close every registered target that can be closed
   */
  async close(): Promise<void> {
    await Promise.all([...this.registry.values()].map((target) => target.close?.()));
    log.debug({ providerIds: this.providerIds }, 'Composite dispatcher closed');
  }
}
