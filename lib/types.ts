/**
 * Core type definitions for the daily story pipeline
 */

/**
 * Pipeline stages in execution order. Each stage is named after the state
 * an item reaches once the stage succeeds.
 */
export type PipelineStage =
  | 'content_fetched'
  | 'content_extracted'
  | 'script_generated'
  | 'audio_generated'
  | 'published';

export type ItemState = 'pending' | PipelineStage | 'dead_lettered';

/** External dependency a stage talks to; one circuit breaker per class. */
export type DependencyClass = 'web' | 'extractor' | 'llm' | 'tts' | 'storage';

export type ErrorKind =
  | 'transient_error'
  | 'timeout'
  | 'dependency_unavailable'
  | 'permanent_error'
  | 'internal_error'
  | 'batch_deadline_exceeded';

export interface RankedItem {
  item_id: string;
  rank: number;
  source_url: string;
  title: string;
  score?: number;
  author?: string;
  posted_at?: string;
  comments_url?: string;
}

export interface FetchedContent {
  url: string;
  final_url: string;
  status: number;
  content_type: string;
  html: string;
  truncated: boolean;
  fetched_at: string;
}

export interface ExtractedContent {
  title: string;
  text: string;
  word_count: number;
  description?: string;
  method: 'article' | 'main' | 'content-block' | 'body';
}

export interface GeneratedScript {
  text: string;
  word_count: number;
  model: string;
}

export interface AudioReference {
  storage_path: string;
  url: string;
  bytes: number;
  content_type: string;
  voice: string;
  reused: boolean;
}

export interface PublishedEpisode {
  episode_url: string;
  manifest_path: string;
  published_at: string;
}

/** Output type produced by each stage. */
export interface StageOutputs {
  content_fetched: FetchedContent;
  content_extracted: ExtractedContent;
  script_generated: GeneratedScript;
  audio_generated: AudioReference;
  published: PublishedEpisode;
}

export type StageOutputMap = { [S in PipelineStage]?: StageOutputs[S] };

/**
 * Ranking metadata plus the stage outputs accumulated so far. An output is
 * written once, when its stage succeeds, and never rewritten afterwards.
 */
export interface ItemPayload {
  metadata: RankedItem;
  outputs: StageOutputMap;
}

export interface ItemError {
  kind: ErrorKind;
  cause: string;
  message: string;
  stage: PipelineStage;
  at: string;
}

export interface ItemRecord {
  item_id: string;
  batch_id: string;
  rank: number;
  stage: ItemState;
  attempt_count: number;
  payload: ItemPayload;
  last_error: ItemError | null;
  failed_stage: PipelineStage | null;
  replay_count: number;
  created_at: string;
  updated_at: string;
  terminal: boolean;
}

export interface DeadLetterEntry {
  entry_id: string;
  item_id: string;
  batch_id: string;
  rank: number;
  stage: PipelineStage;
  last_error: ItemError;
  attempt_count: number;
  dead_lettered_at: string;
}

export type BreakerState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerSnapshot {
  dependency: DependencyClass;
  state: BreakerState;
  consecutive_failures: number;
  opened_at: number | null;
  probe_in_flight: boolean;
}

export type BatchOutcome = 'full_success' | 'partial_success' | 'total_failure';

export interface BatchCounts {
  total: number;
  succeeded: number;
  dead_lettered: number;
  in_progress: number;
}

export interface ItemFailureSummary {
  item_id: string;
  rank: number;
  stage: PipelineStage;
  cause: ErrorKind;
  detail: string;
}

export interface BatchReport {
  batch_id: string;
  run_id: string;
  outcome: BatchOutcome;
  counts: BatchCounts;
  resumed: boolean;
  deadline: string;
  deadline_exceeded: boolean;
  started_at: string;
  completed_at: string;
  published: Array<{ item_id: string; rank: number; title: string; episode_url: string }>;
  failures: ItemFailureSummary[];
  cause_counts: Partial<Record<ErrorKind, number>>;
  feed?: { url?: string; episodes?: number; error?: string };
}

export interface EpisodeManifest {
  batch_id: string;
  item_id: string;
  rank: number;
  title: string;
  source_url: string;
  comments_url?: string;
  description?: string;
  episode_url: string;
  audio_bytes: number;
  duration_sec: number;
  word_count: number;
  published_at: string;
}

export interface PodcastConfig {
  title: string;
  description: string;
  author: string;
  email: string;
  language: string;
  category: string;
  image_url?: string;
  base_url: string;
}

export interface RetryPolicy {
  /** Retries allowed after the first attempt of a stage. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMin: number;
  jitterMax: number;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  windowMs: number;
  cooldownMs: number;
}
