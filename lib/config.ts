/**
 * Configuration management for the story pipeline
 */

import {
  CircuitBreakerConfig,
  DependencyClass,
  PipelineStage,
  PodcastConfig,
  RetryPolicy,
} from './types';

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envKey(value: string): string {
  return value.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

const DEFAULT_STAGE_TIMEOUTS_MS: Record<PipelineStage, number> = {
  content_fetched: 30_000,
  content_extracted: 10_000,
  script_generated: 120_000,
  audio_generated: 300_000,
  published: 60_000,
};

const DEFAULT_DEPENDENCY_CONCURRENCY: Record<DependencyClass, number> = {
  web: 4,
  extractor: 4,
  llm: 2,
  tts: 2,
  storage: 4,
};

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? 'info';
}

// Longest delay setTimeout honours; larger values fire immediately.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function clampTimerDelay(ms: number): number {
  if (!Number.isFinite(ms)) {
    return MAX_TIMER_DELAY_MS;
  }
  return Math.min(Math.max(ms, 0), MAX_TIMER_DELAY_MS);
}

export class Config {
  // Logging
  static LOG_LEVEL: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

  // OpenAI
  static OPENAI_API_KEY = process.env.OPENAI_API_KEY || '';
  static OPENAI_SCRIPT_MODEL = process.env.OPENAI_SCRIPT_MODEL || 'gpt-4o-mini';
  static OPENAI_TTS_MODEL = process.env.OPENAI_TTS_MODEL || 'tts-1';
  static OPENAI_TTS_VOICE = process.env.OPENAI_TTS_VOICE || 'alloy';

  // Storage
  static STORAGE_BACKEND = process.env.STORAGE_BACKEND || 'local';
  static DATA_DIR = process.env.DATA_DIR || './data';
  static BLOB_READ_WRITE_TOKEN = process.env.BLOB_READ_WRITE_TOKEN || '';
  static S3_ENDPOINT = process.env.S3_ENDPOINT || '';
  static S3_BUCKET = process.env.S3_BUCKET || '';
  static S3_ACCESS_KEY = process.env.S3_ACCESS_KEY || '';
  static S3_SECRET_KEY = process.env.S3_SECRET_KEY || '';
  static S3_REGION = process.env.S3_REGION || 'auto';

  // Ranking
  static RANKING_SOURCE = process.env.RANKING_SOURCE || 'hackernews';
  static HN_API_BASE_URL = process.env.HN_API_BASE_URL || 'https://hacker-news.firebaseio.com/v0';
  static RANKING_FEED_URL = process.env.RANKING_FEED_URL || 'https://hnrss.org/frontpage';
  static RANKING_FETCH_CONCURRENCY = intEnv('RANKING_FETCH_CONCURRENCY', 5);

  // Batch
  static TIMEZONE = process.env.TIMEZONE || 'UTC';
  static BATCH_SIZE = intEnv('BATCH_SIZE', 20);
  static BATCH_DEADLINE_MINUTES = intEnv('BATCH_DEADLINE_MINUTES', 120);
  static MAX_CONCURRENT_ITEMS = intEnv('MAX_CONCURRENT_ITEMS', 4);
  static RETENTION_DAYS = intEnv('RETENTION_DAYS', 30);

  // Retry and breaker
  static RETRY_MAX_RETRIES = intEnv('RETRY_MAX_RETRIES', 3);
  static RETRY_BASE_DELAY_MS = intEnv('RETRY_BASE_DELAY_MS', 1000);
  static RETRY_MAX_DELAY_MS = intEnv('RETRY_MAX_DELAY_MS', 30_000);
  static BREAKER_FAILURE_THRESHOLD = intEnv('BREAKER_FAILURE_THRESHOLD', 5);
  static BREAKER_WINDOW_MS = intEnv('BREAKER_WINDOW_MS', 60_000);
  static BREAKER_COOLDOWN_MS = intEnv('BREAKER_COOLDOWN_MS', 30_000);

  // Content
  static USER_AGENT = process.env.USER_AGENT || 'Mozilla/5.0 (compatible; DailyStoryPipeline/1.0)';
  static MIN_WORD_COUNT = intEnv('MIN_WORD_COUNT', 50);
  static MAX_CONTENT_BYTES = intEnv('MAX_CONTENT_BYTES', 1_048_576);
  static MAX_SCRIPT_INPUT_CHARS = intEnv('MAX_SCRIPT_INPUT_CHARS', 12_000);
  static ALLOWED_CONTENT_TYPES = (process.env.ALLOWED_CONTENT_TYPES || 'text/html,application/xhtml+xml')
    .split(',')
    .map(type => type.trim().toLowerCase())
    .filter(Boolean);

  // Podcast
  static PODCAST_BASE_URL = process.env.PODCAST_BASE_URL || 'http://localhost:3000';
  static PODCAST_TITLE = process.env.PODCAST_TITLE || 'Daily Top Stories';
  static PODCAST_DESCRIPTION = process.env.PODCAST_DESCRIPTION ||
    'The day\'s top-ranked stories, each read as a short narrated segment.';
  static PODCAST_AUTHOR = process.env.PODCAST_AUTHOR || 'Daily Top Stories';
  static PODCAST_EMAIL = process.env.PODCAST_EMAIL || 'podcast@example.com';
  static PODCAST_LANGUAGE = process.env.PODCAST_LANGUAGE || 'en-us';
  static PODCAST_CATEGORY = process.env.PODCAST_CATEGORY || 'Technology';
  static PODCAST_IMAGE_URL = process.env.PODCAST_IMAGE_URL || '';
  static FEED_MAX_EPISODES = intEnv('FEED_MAX_EPISODES', 30);

  static getRetryPolicy(stage: PipelineStage): RetryPolicy {
    return {
      maxRetries: intEnv(`RETRY_MAX_RETRIES_${envKey(stage)}`, Config.RETRY_MAX_RETRIES),
      baseDelayMs: Config.RETRY_BASE_DELAY_MS,
      maxDelayMs: Config.RETRY_MAX_DELAY_MS,
      jitterMin: 0.5,
      jitterMax: 1.5,
    };
  }

  static getStageTimeout(stage: PipelineStage): number {
    return intEnv(`STAGE_TIMEOUT_MS_${envKey(stage)}`, DEFAULT_STAGE_TIMEOUTS_MS[stage]);
  }

  static getDependencyConcurrency(dependency: DependencyClass): number {
    return intEnv(`DEPENDENCY_CONCURRENCY_${envKey(dependency)}`, DEFAULT_DEPENDENCY_CONCURRENCY[dependency]);
  }

  static getBreakerConfig(): CircuitBreakerConfig {
    return {
      failureThreshold: Config.BREAKER_FAILURE_THRESHOLD,
      windowMs: Config.BREAKER_WINDOW_MS,
      cooldownMs: Config.BREAKER_COOLDOWN_MS,
    };
  }

  static getBatchDeadlineMs(): number {
    return clampTimerDelay(Config.BATCH_DEADLINE_MINUTES * 60 * 1000);
  }

  static getPodcastConfig(): PodcastConfig {
    return {
      title: Config.PODCAST_TITLE,
      description: Config.PODCAST_DESCRIPTION,
      author: Config.PODCAST_AUTHOR,
      email: Config.PODCAST_EMAIL,
      language: Config.PODCAST_LANGUAGE,
      category: Config.PODCAST_CATEGORY,
      ...(Config.PODCAST_IMAGE_URL ? { image_url: Config.PODCAST_IMAGE_URL } : {}),
      base_url: Config.PODCAST_BASE_URL,
    };
  }
}
