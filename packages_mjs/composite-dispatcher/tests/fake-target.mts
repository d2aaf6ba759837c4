/**
 * In-process provider target with scripted latency and outcome
 */
import { createEnvelope } from '@llm-dispatch/fetch-client';
import type {
  ErrorKind,
  JsonValue,
  ProviderResult,
  ProviderTarget,
  RequestEnvelope,
  SendOptions,
} from '@llm-dispatch/fetch-client';
import type { ResolvedProxy } from '@llm-dispatch/fetch-proxy-config';

export interface Step {
  delayMs?: number;
  body?: JsonValue;
  fail?: ErrorKind;
  throws?: Error;
}

export const NO_PROXY: ResolvedProxy = { url: null, source: 'none', trustEnv: true };

export const envelope = createEnvelope({ model: 'model-a', messages: [{ role: 'user', content: 'Hi' }] });

export class FakeTarget implements ProviderTarget {
  readonly signals: AbortSignal[] = [];
  readonly envelopes: RequestEnvelope[] = [];
  calls = 0;
  completed = 0;
  closed = false;
  private readonly steps: Step[];

  constructor(
    readonly providerId: string,
    script: Step | Step[] = {}
  ) {
    this.steps = Array.isArray(script) ? script : [script];
  }

  send(request: RequestEnvelope, options: SendOptions = {}): Promise<ProviderResult> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    this.envelopes.push(request);
    if (step.throws) {
      return Promise.reject(step.throws);
    }

    const { signal } = options;
    if (signal) {
      this.signals.push(signal);
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve(this.failure('cancelled', 'aborted', step.delayMs ?? 0));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        this.completed++;
        resolve(
          step.fail
            ? this.failure(step.fail, `${this.providerId} failed`, step.delayMs ?? 0)
            : {
                status: 'ok',
                providerId: this.providerId,
                body: step.body ?? { text: this.providerId },
                latencyMs: step.delayMs ?? 0,
                httpStatus: 200,
                proxy: NO_PROXY,
              }
        );
      }, step.delayMs ?? 0);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private failure(kind: ErrorKind, message: string, latencyMs: number): ProviderResult {
    return { status: 'error', providerId: this.providerId, body: { kind, message }, latencyMs, proxy: NO_PROXY };
  }
}

export function chatCompletion(content: string, usage?: JsonValue, model = 'model-a'): JsonValue {
  return {
    id: `chatcmpl-${content}`,
    object: 'chat.completion',
    created: 1700000000,
    model,
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    ...(usage !== undefined && { usage }),
  };
}
