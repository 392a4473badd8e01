import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile, stat } from 'fs/promises';
import { resolve } from 'path';
import { AppConfig } from '../config/app.config';
import { ClockService } from '../common/clock.service';
import { EventLogCache } from './event-log.cache';
import { EventLogUnavailableError } from './event-log.errors';

export interface EventLogSource {
  kind: 'remote' | 'local';
  location: string;
  /** File modification time; null for remote sources. */
  modifiedAt: Date | null;
}

export interface EventLogSnapshot {
  records: readonly unknown[];
  source: EventLogSource;
  fetchedAt: Date;
}

const REQUEST_HEADERS = {
  'Cache-Control': 'no-cache',
  Pragma: 'no-cache',
  Accept: 'application/json',
  'User-Agent': 'user-status-board',
} as const;

// fs errors are raised from another realm under Jest, so no instanceof checks here.
const describeError = (error: unknown): string =>
  typeof error === 'object' &&
  error !== null &&
  'message' in error &&
  typeof error.message === 'string'
    ? error.message
    : String(error);

const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 'ENOENT';

@Injectable()
export class EventLogService {
  private readonly logger = new Logger(EventLogService.name);
  private readonly url: string | null;
  private readonly path: string;
  private readonly ttlSeconds: number;
  private readonly fetchTimeoutMs: number;
  private readonly cache: EventLogCache<EventLogSnapshot>;
  private inFlight: Promise<EventLogSnapshot> | null = null;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly clock: ClockService,
  ) {
    const eventLogConfig = this.configService.get('eventLog', { infer: true });
    this.url = eventLogConfig.url;
    this.path = resolve(eventLogConfig.path);
    this.ttlSeconds = eventLogConfig.cacheTtlSeconds;
    this.fetchTimeoutMs = eventLogConfig.fetchTimeoutMs;
    this.cache = new EventLogCache(this.ttlSeconds * 1000);
  }

  get location(): string {
    return this.url ?? this.path;
  }

  get cacheExpiresAt(): Date | null {
    const expiresAt = this.cache.expiresAt;
    return expiresAt === null ? null : new Date(expiresAt);
  }

  /**
   * Returns the cached snapshot while it is fresh, otherwise loads the log.
   * Concurrent callers share one in-flight load.
   */
  async load(): Promise<EventLogSnapshot> {
    const now = this.clock.now().getTime();
    const cached = this.cache.get(now);
    if (cached && (await this.isUnchanged(cached))) {
      return cached;
    }

    if (this.inFlight) {
      return this.inFlight;
    }

    const generation = this.cache.generation;
    const pending = this.fetchSnapshot(now)
      .then((snapshot) => {
        if (!this.cache.set(snapshot, now, generation)) {
          this.logger.debug(
            `Discarded event log loaded before the last invalidation (${this.location})`,
          );
        }
        return snapshot;
      })
      .finally(() => {
        if (this.inFlight === pending) {
          this.inFlight = null;
        }
      });
    this.inFlight = pending;
    return pending;
  }

  invalidate(): void {
    this.cache.invalidate();
    this.inFlight = null;
  }

  async refresh(): Promise<EventLogSnapshot> {
    this.invalidate();
    return this.load();
  }

  private async isUnchanged(snapshot: EventLogSnapshot): Promise<boolean> {
    if (snapshot.source.kind === 'remote' || !snapshot.source.modifiedAt) {
      return true;
    }

    try {
      const stats = await stat(this.path);
      return Math.floor(stats.mtimeMs) === snapshot.source.modifiedAt.getTime();
    } catch (error) {
      this.logger.debug(
        `Could not stat ${this.path}, reloading: ${describeError(error)}`,
      );
      return false;
    }
  }

  private fetchSnapshot(now: number): Promise<EventLogSnapshot> {
    return this.url ? this.fetchRemote(this.url, now) : this.readLocal(now);
  }

  private async fetchRemote(url: string, now: number): Promise<EventLogSnapshot> {
    // The bucket changes once per TTL so CDN caches in front of the log are bypassed.
    const bucket = Math.floor(now / 1000 / this.ttlSeconds);
    const target = `${url}${url.includes('?') ? '&' : '?'}v=${bucket}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.fetchTimeoutMs);

    let body: string;
    try {
      const response = await fetch(target, {
        method: 'GET',
        headers: REQUEST_HEADERS,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new EventLogUnavailableError(
          `Event log request to ${url} failed with HTTP ${response.status}`,
          url,
        );
      }

      body = await response.text();
    } catch (error) {
      if (error instanceof EventLogUnavailableError) {
        throw error;
      }
      const reason = controller.signal.aborted
        ? `timed out after ${this.fetchTimeoutMs} ms`
        : describeError(error);
      throw new EventLogUnavailableError(
        `Failed to fetch event log from ${url}: ${reason}`,
        url,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
    }

    const records = this.parseRecords(body, url);
    this.logger.log(`Fetched ${records.length} records from ${url}`);

    return {
      records,
      source: { kind: 'remote', location: url, modifiedAt: null },
      fetchedAt: new Date(now),
    };
  }

  private async readLocal(now: number): Promise<EventLogSnapshot> {
    let content: string;
    let modifiedAt: Date;
    try {
      const stats = await stat(this.path);
      content = await readFile(this.path, 'utf8');
      modifiedAt = new Date(stats.mtimeMs);
    } catch (error) {
      const reason = isMissingFile(error)
        ? `Event log not found: ${this.path}`
        : `Failed to read event log ${this.path}: ${describeError(error)}`;
      throw new EventLogUnavailableError(reason, this.path, { cause: error });
    }

    const records = this.parseRecords(content, this.path);
    this.logger.log(`Loaded ${records.length} records from ${this.path}`);

    return {
      records,
      source: { kind: 'local', location: this.path, modifiedAt },
      fetchedAt: new Date(now),
    };
  }

  private parseRecords(content: string, location: string): unknown[] {
    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch (error) {
      throw new EventLogUnavailableError(
        `Event log at ${location} is not valid JSON: ${describeError(error)}`,
        location,
        { cause: error },
      );
    }

    if (Array.isArray(payload)) {
      return payload;
    }

    if (
      payload !== null &&
      typeof payload === 'object' &&
      'records' in payload &&
      Array.isArray(payload.records)
    ) {
      return payload.records;
    }

    throw new EventLogUnavailableError(
      `Event log at ${location} must be a JSON array of records`,
      location,
    );
  }
}
