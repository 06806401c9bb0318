import { RankedItem } from '../types';

/**
 * Collaborator that lists the day's top-ranked items. Implementations throw
 * SourceUnavailableError, or a transient StageFailure, when the ranking
 * cannot be read.
 */
export interface RankingSource {
  readonly name: string;
  listTodayItems(limit: number, signal?: AbortSignal): Promise<RankedItem[]>;
}
