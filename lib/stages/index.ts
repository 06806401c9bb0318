import { StageHandlers } from '../pipeline/stages';
import { StorageTool } from '../tools/storage';
import { AudioStage } from './audio';
import { ExtractStage } from './extract';
import { FetchStage } from './fetch';
import { PublishStage } from './publish';
import { ScriptStage } from './script';

export { AudioStage, ExtractStage, FetchStage, PublishStage, ScriptStage };

/**
 * The production stage implementations, wired to one storage facade.
 */
export function createStageHandlers(storage: StorageTool = new StorageTool()): StageHandlers {
  return {
    content_fetched: new FetchStage(),
    content_extracted: new ExtractStage(),
    script_generated: new ScriptStage(),
    audio_generated: new AudioStage({ storage }),
    published: new PublishStage(storage),
  };
}
