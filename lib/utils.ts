/**
 * Utility functions
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { Config, LogLevel } from './config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class Logger {
  static log(level: 'info' | 'warn' | 'error' | 'debug', message: string, obj?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[Config.LOG_LEVEL]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      message,
      ...(obj !== undefined ? { data: obj } : {}),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else if (level === 'warn') {
      console.warn(JSON.stringify(logEntry));
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  static info(message: string, obj?: unknown) {
    this.log('info', message, obj);
  }

  static warn(message: string, obj?: unknown) {
    this.log('warn', message, obj);
  }

  static error(message: string, obj?: unknown) {
    this.log('error', message, obj);
  }

  static debug(message: string, obj?: unknown) {
    this.log('debug', message, obj);
  }
}

export class Crypto {
  static sha256(input: string | Buffer): string {
    return createHash('sha256').update(input).digest('hex');
  }

  static uuid(): string {
    return uuidv4();
  }
}

export class Clock {
  static toDateString(date: Date): string {
    return date.toISOString().split('T')[0];
  }

  static addHours(date: Date, hours: number): Date {
    return new Date(date.getTime() + hours * 60 * 60 * 1000);
  }

  static addDays(date: Date, days: number): Date {
    return Clock.addHours(date, days * 24);
  }

  /**
   * Date-scoped batch identifier (YYYY-MM-DD) in the given timezone.
   */
  static batchIdFor(date: Date, timeZone: string = Config.TIMEZONE): string {
    const parts = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    }).formatToParts(date);

    const part = (type: 'year' | 'month' | 'day') =>
      parts.find(p => p.type === type)?.value ?? '';

    return `${part('year')}-${part('month')}-${part('day')}`;
  }
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Races `promise` against `signal`. When the signal wins, the returned promise
 * rejects with the signal's reason and the original promise is left to settle
 * on its own.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function extractDomain(url: string): string {
  try {
    const parsed = new URL(url);
    return parsed.hostname.replace(/^www\./, '');
  } catch {
    return 'unknown';
  }
}

export function truncate(text: string, maxLength: number, suffix = '...'): string {
  if (!text || typeof text !== 'string') {
    return '';
  }
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength - suffix.length) + suffix;
}

export function cleanText(text: string): string {
  if (!text || typeof text !== 'string') {
    return '';
  }
  return text
    .replace(/\s+/g, ' ')
    .replace(/[\r\n]+/g, ' ')
    .trim();
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function estimateReadingTime(text: string, wpm = 150): number {
  return Math.ceil((countWords(text) / wpm) * 60); // seconds
}
