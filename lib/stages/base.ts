/**
 * Base Stage class - Foundation for all pipeline stage implementations
 */

import { StageContext, StageHandler } from '../pipeline/stages';
import { DependencyClass, ItemPayload, PipelineStage, StageOutputs } from '../types';
import { Logger, errorMessage } from '../utils';

export abstract class BaseStage<S extends PipelineStage> implements StageHandler<S> {
  abstract readonly stage: S;
  abstract readonly dependency: DependencyClass;

  // Calls made by this instance, for diagnostics
  protected callCount = 0;

  /**
   * Runs the stage once. Retry, timeout and classification happen in the
   * executor; this only adds the stage-level logs.
   */
  async run(payload: ItemPayload, ctx: StageContext): Promise<StageOutputs[S]> {
    const startTime = Date.now();
    this.callCount++;

    Logger.debug(`${this.stage} starting`, {
      batch_id: ctx.batch_id,
      item_id: ctx.item_id,
      attempt: ctx.attempt,
    });

    try {
      const output = await this.process(payload, ctx);
      Logger.debug(`${this.stage} completed`, {
        batch_id: ctx.batch_id,
        item_id: ctx.item_id,
        duration_ms: Date.now() - startTime,
      });
      return output;
    } catch (error) {
      Logger.debug(`${this.stage} failed`, {
        batch_id: ctx.batch_id,
        item_id: ctx.item_id,
        duration_ms: Date.now() - startTime,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  get calls(): number {
    return this.callCount;
  }

  /**
   * Stage logic. Must be safe to call again with the same payload.
   */
  protected abstract process(payload: ItemPayload, ctx: StageContext): Promise<StageOutputs[S]>;
}
