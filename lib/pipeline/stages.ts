/**
 * Stage table - the fixed, ordered list of pipeline stages and the
 * forward-only transition rules derived from it.
 */

import {
  DependencyClass,
  ItemPayload,
  ItemState,
  PipelineStage,
  StageOutputMap,
  StageOutputs,
} from '../types';

export const STAGE_SEQUENCE: readonly PipelineStage[] = [
  'content_fetched',
  'content_extracted',
  'script_generated',
  'audio_generated',
  'published',
];

const STATE_ORDER: readonly ItemState[] = ['pending', ...STAGE_SEQUENCE];

export interface StageContext {
  batch_id: string;
  item_id: string;
  /** Attempt number for this stage, starting at 0. */
  attempt: number;
  /** Aborted on stage timeout or when the batch is cancelled. */
  signal: AbortSignal;
}

/**
 * Contract every stage implementation satisfies. Implementations must be
 * safe to invoke more than once with the same payload.
 */
export interface StageHandler<S extends PipelineStage> {
  readonly stage: S;
  readonly dependency: DependencyClass;
  run(payload: ItemPayload, ctx: StageContext): Promise<StageOutputs[S]>;
}

export type StageHandlers = { [S in PipelineStage]: StageHandler<S> };

export function isTerminal(state: ItemState): boolean {
  return state === 'published' || state === 'dead_lettered';
}

/**
 * The stage that moves an item out of `state`, or null for terminal states.
 */
export function nextStage(state: ItemState): PipelineStage | null {
  if (isTerminal(state)) {
    return null;
  }
  const index = STATE_ORDER.indexOf(state);
  return STAGE_SEQUENCE[index] ?? null;
}

/**
 * The state an item sits in while `stage` is the one being executed.
 */
export function precedingState(stage: PipelineStage): ItemState {
  return STATE_ORDER[STAGE_SEQUENCE.indexOf(stage)];
}

export function canTransition(from: ItemState, to: ItemState): boolean {
  if (isTerminal(from)) {
    return false;
  }
  if (to === 'dead_lettered') {
    return true;
  }
  return nextStage(from) === to;
}

/**
 * Returns a new payload with `output` recorded for `stage`. Outputs of
 * completed stages are never overwritten.
 */
export function withStageOutput<S extends PipelineStage>(
  payload: ItemPayload,
  stage: S,
  output: StageOutputs[S]
): ItemPayload {
  if (payload.outputs[stage] !== undefined) {
    throw new Error(`Output for stage ${stage} is already recorded`);
  }
  const outputs: StageOutputMap = { ...payload.outputs };
  outputs[stage] = output;
  return { ...payload, outputs };
}

/**
 * Reads the output of an earlier stage, failing when it is missing.
 */
export function requireOutput<S extends PipelineStage>(payload: ItemPayload, stage: S): StageOutputs[S] {
  const output = payload.outputs[stage];
  if (output === undefined) {
    throw new Error(`Payload is missing output of stage ${stage}`);
  }
  return output;
}
