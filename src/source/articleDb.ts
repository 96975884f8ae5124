import type Database from 'better-sqlite3';
import type { ArticleRecord, FailureEvent, FailureType, RunSummary, TelemetrySink } from './adapter.js';
import { domainOf, generateId, nowISO } from '../shared/utils.js';
import { DbError } from '../shared/errors.js';

export interface StoredArticle {
  id: string;
  published_date: string;
  title: string;
  link: string;
  source: string;
  domain: string;
  tier: number;
  extracted_at: string;
}

export interface StoredErrorEvent {
  id: string;
  source: string;
  error_type: FailureType;
  message: string;
  url: string;
  domain: string;
  metadata: Record<string, unknown>;
  traceback: string | null;
  created_at: string;
}

export interface StoredRunEvent extends RunSummary {
  id: string;
  created_at: string;
}

export interface ArticleStats {
  total: number;
  bySource: Array<{ source: string; count: number }>;
  /** YYYY-MM of the publish date; undated articles are left out. */
  byMonth: Array<{ month: string; count: number }>;
}

interface ErrorEventRow extends Omit<StoredErrorEvent, 'metadata'> {
  metadata_json: string;
}

// ================================================================
// Articles
// ================================================================

export function listArticleTitles(db: Database.Database): string[] {
  const rows = db.prepare('SELECT title FROM articles').all() as Array<{ title: string }>;
  return rows.map((r) => r.title);
}

/**
 * Insert all records in one transaction. Returns the number written.
 */
export function insertArticles(db: Database.Database, records: readonly ArticleRecord[]): number {
  if (records.length === 0) return 0;

  const stmt = db.prepare(
    `INSERT INTO articles (id, published_date, title, link, source, domain, tier, extracted_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
  );
  const extractedAt = nowISO();

  const insertAll = db.transaction((batch: readonly ArticleRecord[]) => {
    for (const r of batch) {
      stmt.run(generateId(), r.date, r.title, r.link, r.source, domainOf(r.link), r.tier, extractedAt);
    }
  });

  try {
    insertAll(records);
  } catch (err) {
    throw new DbError(`Failed to insert articles: ${err instanceof Error ? err.message : String(err)}`, {
      count: records.length,
    });
  }
  return records.length;
}

export function listRecentArticles(db: Database.Database, limit = 20): StoredArticle[] {
  return db
    .prepare(
      `SELECT * FROM articles
       ORDER BY published_date DESC, extracted_at DESC
       LIMIT ?`,
    )
    .all(limit) as StoredArticle[];
}

export function articleStats(db: Database.Database): ArticleStats {
  const { total } = db.prepare('SELECT COUNT(*) AS total FROM articles').get() as { total: number };
  const bySource = db
    .prepare(
      `SELECT source, COUNT(*) AS count FROM articles
       GROUP BY source
       ORDER BY count DESC, source ASC`,
    )
    .all() as ArticleStats['bySource'];
  const byMonth = db
    .prepare(
      `SELECT substr(published_date, 1, 7) AS month, COUNT(*) AS count FROM articles
       WHERE published_date != ''
       GROUP BY month
       ORDER BY month DESC`,
    )
    .all() as ArticleStats['byMonth'];
  return { total, bySource, byMonth };
}

// ================================================================
// Error events
// ================================================================

export function insertErrorEvent(db: Database.Database, event: FailureEvent): string {
  const id = generateId();
  db.prepare(
    `INSERT INTO error_events (id, source, error_type, message, url, domain, metadata_json, traceback, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    event.source,
    event.error_type,
    event.message,
    event.url,
    event.domain,
    JSON.stringify(event.metadata),
    event.traceback ?? null,
    nowISO(),
  );
  return id;
}

export function listErrorEvents(db: Database.Database, limit = 20): StoredErrorEvent[] {
  const rows = db
    .prepare('SELECT * FROM error_events ORDER BY created_at DESC, rowid DESC LIMIT ?')
    .all(limit) as ErrorEventRow[];

  return rows.map(({ metadata_json, ...rest }) => {
    const metadata: unknown = JSON.parse(metadata_json);
    return {
      ...rest,
      metadata:
        metadata !== null && typeof metadata === 'object' && !Array.isArray(metadata)
          ? { ...metadata }
          : {},
    };
  });
}

// ================================================================
// Run events
// ================================================================

export function insertRunEvent(db: Database.Database, summary: RunSummary): string {
  const id = generateId();
  db.prepare(
    `INSERT INTO run_events (id, providers_total, providers_processed, providers_failed,
       articles_found, articles_written, duration_ms, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    summary.providers_total,
    summary.providers_processed,
    summary.providers_failed,
    summary.articles_found,
    summary.articles_written,
    summary.duration_ms,
    nowISO(),
  );
  return id;
}

export function listRunEvents(db: Database.Database, limit = 20): StoredRunEvent[] {
  return db
    .prepare('SELECT * FROM run_events ORDER BY created_at DESC, rowid DESC LIMIT ?')
    .all(limit) as StoredRunEvent[];
}

/**
 * Telemetry sink writing failure events to error_events and cycle
 * summaries to run_events.
 */
export class SqliteTelemetrySink implements TelemetrySink {
  constructor(private readonly db: Database.Database) {}

  record(event: FailureEvent): void {
    insertErrorEvent(this.db, event);
  }

  recordSummary(summary: RunSummary): void {
    insertRunEvent(this.db, summary);
  }
}
