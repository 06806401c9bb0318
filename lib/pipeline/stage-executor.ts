/**
 * Stage Executor - runs one stage implementation for one item under the
 * stage's timeout, retry classification, circuit breaker and concurrency
 * limit.
 */

import { StageFailure } from '../errors';
import {
  DependencyClass,
  ErrorKind,
  ItemError,
  ItemPayload,
  PipelineStage,
  RetryPolicy,
  StageOutputs,
} from '../types';
import { Logger, abortable, errorMessage } from '../utils';
import { computeBackoff } from './backoff';
import { CircuitBreaker, GrantedPermit } from './circuit-breaker';
import { Semaphore } from './semaphore';
import { StageContext, StageHandler } from './stages';

export interface StageExecutorOptions<S extends PipelineStage> {
  handler: StageHandler<S>;
  policy: RetryPolicy;
  timeoutMs: number;
  breaker: CircuitBreaker;
  semaphore: Semaphore;
  random?: () => number;
}

export type StageResult<S extends PipelineStage> =
  | { ok: true; output: StageOutputs[S] }
  | { ok: false; error: ItemError; retryable: boolean };

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'transient_error',
  'timeout',
  'dependency_unavailable',
  'internal_error',
]);

class StageTimeout extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Stage exceeded its ${timeoutMs}ms timeout`);
    this.name = 'StageTimeout';
  }
}

export class StageExecutor<S extends PipelineStage> {
  readonly stage: S;
  readonly dependency: DependencyClass;
  private readonly handler: StageHandler<S>;
  private readonly policy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly breaker: CircuitBreaker;
  private readonly semaphore: Semaphore;
  private readonly random: () => number;

  constructor(options: StageExecutorOptions<S>) {
    this.handler = options.handler;
    this.stage = options.handler.stage;
    this.dependency = options.handler.dependency;
    this.policy = options.policy;
    this.timeoutMs = options.timeoutMs;
    this.breaker = options.breaker;
    this.semaphore = options.semaphore;
    this.random = options.random ?? Math.random;
  }

  get maxRetries(): number {
    return this.policy.maxRetries;
  }

  isRetryable(kind: ErrorKind): boolean {
    return RETRYABLE_KINDS.has(kind);
  }

  backoffDelay(attempt: number): number {
    return computeBackoff(this.policy, attempt, this.random);
  }

  /**
   * Executes the stage once. Never throws: every outcome is reported as a
   * StageResult. `ctx.signal` is the batch cancellation signal.
   */
  async execute(payload: ItemPayload, ctx: StageContext): Promise<StageResult<S>> {
    const batchSignal = ctx.signal;
    if (batchSignal.aborted) {
      return this.failure('batch_deadline_exceeded', 'cancelled', 'Batch cancelled before the stage started');
    }

    // The breaker is consulted only once a dependency slot is held, so calls
    // queued behind a failing one see the breaker it opened.
    const acquired = await this.semaphore.acquire(batchSignal);
    if (!acquired) {
      return this.failure('batch_deadline_exceeded', 'cancelled', 'Batch cancelled while waiting for a dependency slot');
    }

    const permit = this.breaker.tryAcquire();
    if (!permit.granted) {
      this.semaphore.release();
      Logger.debug('Stage call rejected by open circuit breaker', {
        stage: this.stage,
        dependency: this.dependency,
        item_id: ctx.item_id,
        retry_after_ms: permit.retryAfterMs,
      });
      return this.failure(
        'dependency_unavailable',
        'breaker_open',
        `Circuit breaker for ${this.dependency} is open`
      );
    }

    const controller = new AbortController();
    const onBatchAbort = () => controller.abort(batchSignal.reason);
    batchSignal.addEventListener('abort', onBatchAbort, { once: true });
    const timer = setTimeout(() => controller.abort(new StageTimeout(this.timeoutMs)), this.timeoutMs);
    const startTime = Date.now();

    try {
      const call = Promise.resolve().then(() =>
        this.handler.run(payload, { ...ctx, signal: controller.signal })
      );
      const output = await abortable(call, controller.signal).catch(error => {
        // The abandoned call may still settle; its outcome is only logged.
        if (controller.signal.aborted) {
          call.catch(lateError => {
            Logger.debug('Abandoned stage call settled with an error', {
              stage: this.stage,
              item_id: ctx.item_id,
              error: errorMessage(lateError),
            });
          });
        }
        throw error;
      });

      this.breaker.recordSuccess(permit);
      Logger.debug('Stage call succeeded', {
        stage: this.stage,
        item_id: ctx.item_id,
        attempt: ctx.attempt,
        duration_ms: Date.now() - startTime,
      });
      return { ok: true, output };
    } catch (error) {
      return this.classify(error, permit, batchSignal, controller.signal, ctx);
    } finally {
      clearTimeout(timer);
      batchSignal.removeEventListener('abort', onBatchAbort);
      this.semaphore.release();
    }
  }

  private classify(
    error: unknown,
    permit: GrantedPermit,
    batchSignal: AbortSignal,
    callSignal: AbortSignal,
    ctx: StageContext
  ): StageResult<S> {
    if (batchSignal.aborted) {
      this.breaker.release(permit);
      return this.failure('batch_deadline_exceeded', 'cancelled', 'Batch deadline reached during the stage call');
    }

    if (callSignal.aborted && callSignal.reason instanceof StageTimeout) {
      this.breaker.recordFailure(permit);
      return this.failure('timeout', 'stage_timeout', callSignal.reason.message);
    }

    if (error instanceof StageFailure) {
      if (error.retryable) {
        this.breaker.recordFailure(permit);
        return this.failure('transient_error', error.code, error.message);
      }
      // The dependency answered; the input was at fault.
      this.breaker.recordSuccess(permit);
      return this.failure('permanent_error', error.code, error.message);
    }

    this.breaker.release(permit);
    Logger.error('Stage raised an unexpected error', {
      severity: 'high',
      stage: this.stage,
      batch_id: ctx.batch_id,
      item_id: ctx.item_id,
      attempt: ctx.attempt,
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return this.failure('internal_error', 'unexpected_exception', errorMessage(error));
  }

  private failure(kind: ErrorKind, cause: string, message: string): StageResult<S> {
    return {
      ok: false,
      retryable: this.isRetryable(kind),
      error: {
        kind,
        cause,
        message,
        stage: this.stage,
        at: new Date().toISOString(),
      },
    };
  }
}
