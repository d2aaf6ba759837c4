/**
 * Type definitions for @llm-dispatch/composite-dispatcher
 */
import type {
  JsonValue,
  ProviderResult,
  ProviderSuccess,
  ProviderTarget,
} from '@llm-dispatch/fetch-client';

/**
 * How several provider results become one
 *
 * - first-success: the first ok result wins, the rest are cancelled
 * - all-required: every target must succeed
 * - best-effort: merge whatever succeeded
 */
export type MergePolicy = 'first-success' | 'all-required' | 'best-effort';

/**
 * Lifecycle of one composite call
 */
export type CompositeCallState = 'pending' | 'in-flight' | 'merging' | 'done';

/**
 * Combines successful bodies into the composite body
 */
export type BodyMerger = (successes: readonly ProviderSuccess[], callId: string) => JsonValue;

/**
 * A target selected by registered provider id or by instance
 */
export type TargetSelector = string | ProviderTarget;

/**
 * Dispatcher configuration
 */
export interface CompositeDispatcherConfig {
  /** Default: 'best-effort' */
  policy?: MergePolicy;
  /** Bound on a whole composite call in ms. Default: none */
  deadlineMs?: number;
  merger?: BodyMerger;
  targets?: ProviderTarget[];
}

/**
 * Per-call options
 */
export interface DispatchOptions {
  policy?: MergePolicy;
  deadlineMs?: number;
  /** Aborting cancels every outstanding provider call */
  signal?: AbortSignal;
}

/**
 * Outcome of one composite call
 */
export interface CompositeResult {
  callId: string;
  policy: MergePolicy;
  state: 'done';
  /** One entry per target, in registration order */
  results: ProviderResult[];
  /** null when nothing succeeded before the deadline */
  mergedBody: JsonValue;
  /** Provider whose body won under first-success */
  winner?: string;
  deadlineExceeded: boolean;
  durationMs: number;
}

/**
 * Diagnostics event emitted once per composite call
 */
export interface CompositeEndEvent {
  callId: string;
  policy: MergePolicy;
  providerIds: string[];
  outcome: 'ok' | 'deadline-exceeded' | 'partial-failure' | 'all-failed';
  succeeded: number;
  failed: number;
  winner?: string;
  durationMs: number;
  timestamp: number;
}

