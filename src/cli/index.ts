#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getFeedscoutDir, getPackageRoot, resolvePath } from '../shared/utils.js';
import { loadProviders } from '../shared/providers.js';
import { openDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { parseStrategy } from '../source/strategy.js';
import {
  articleStats,
  listErrorEvents,
  listRecentArticles,
  listRunEvents,
} from '../source/articleDb.js';
import { runDiscoveryCycle, type CycleReport } from '../engine/discover.js';
import { startScheduler, stopScheduler } from '../engine/scheduler.js';
import type { ProviderSpec } from '../source/adapter.js';
import { parsePositiveInt } from './options.js';

const program = new Command();

program
  .name('feedscout')
  .description('Discover new articles on engineering blogs and feeds')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create config, an example providers file and the database')
  .action(async () => {
    const dir = getFeedscoutDir();
    const configPath = path.join(dir, 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();

    const providersPath = resolvePath(config.providers_file);
    const example = path.join(getPackageRoot(), 'providers.example.yaml');
    if (!fs.existsSync(providersPath) && fs.existsSync(example)) {
      fs.mkdirSync(path.dirname(providersPath), { recursive: true });
      fs.copyFileSync(example, providersPath);
      log(`✓ ${providersPath} created from example`);
    } else {
      log(`✓ ${providersPath} ${fs.existsSync(providersPath) ? 'already exists' : 'not created (no example found)'}`);
    }

    const db = openDb(config.db.path);
    try {
      const { applied } = runMigrations(db);
      log(`✓ database ready (${applied.length} migrations applied)`);
    } finally {
      closeDb(db);
    }
  });

// === providers ===
program
  .command('providers')
  .description('List configured providers and how each will be extracted')
  .action(async () => {
    const config = await loadConfig();
    const providers = loadProviders(config.providers_file);

    if (providers.length === 0) {
      log('No providers configured.');
      return;
    }
    for (const p of providers) {
      const strategy = parseStrategy(p.strategy, p.element, p.url);
      const label = strategy ? strategy.kind : 'unresolved';
      log(`${p.name.padEnd(20)} ${label.padEnd(10)} ${p.url}`);
    }
  });

// === run ===
program
  .command('run')
  .description('Run one discovery cycle')
  .option('-n, --dry-run', 'Discover without writing articles or events')
  .option('-p, --provider <names...>', 'Only run these providers')
  .option('-c, --concurrency <n>', 'Providers processed at once', parsePositiveInt)
  .action(async (opts: { dryRun?: boolean; provider?: string[]; concurrency?: number }) => {
    const config = await loadConfig();
    const providers = selectProviders(loadProviders(config.providers_file), opts.provider);

    const report = await withDb(config, (db) =>
      runDiscoveryCycle(config, {
        db,
        providers,
        dryRun: opts.dryRun,
        concurrency: opts.concurrency,
      }),
    );
    printReport(report, opts.dryRun ?? false);
  });

// === watch ===
program
  .command('watch')
  .description('Run discovery on the configured cron schedule')
  .action(async () => {
    const config = await loadConfig();
    const db = openDb(config.db.path);
    try {
      runMigrations(db);
      startScheduler(config, async () => {
        const providers = loadProviders(config.providers_file);
        const report = await runDiscoveryCycle(config, { db, providers });
        printReport(report, false);
      });
    } catch (err) {
      closeDb(db);
      throw err;
    }

    const shutdown = (): void => {
      stopScheduler();
      closeDb(db);
      process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });

// === articles ===
program
  .command('articles')
  .description('Show recently discovered articles')
  .option('-l, --limit <n>', 'Number of articles', parsePositiveInt, 20)
  .action(async (opts: { limit: number }) => {
    const config = await loadConfig();
    const rows = await withDb(config, async (db) => listRecentArticles(db, opts.limit));
    if (rows.length === 0) {
      log('No articles stored yet.');
      return;
    }
    for (const a of rows) {
      log(`${(a.published_date || '----------').padEnd(11)} [${a.source}] ${a.title}`);
      log(`            ${a.link}`);
    }
  });

// === errors ===
program
  .command('errors')
  .description('Show recent failure events')
  .option('-l, --limit <n>', 'Number of events', parsePositiveInt, 20)
  .action(async (opts: { limit: number }) => {
    const config = await loadConfig();
    const events = await withDb(config, async (db) => listErrorEvents(db, opts.limit));
    if (events.length === 0) {
      log('No failure events recorded.');
      return;
    }
    for (const e of events) {
      log(`${e.created_at} ${e.error_type.padEnd(18)} ${e.source.padEnd(16)} ${e.message}`);
    }
  });

// === stats ===
program
  .command('stats')
  .description('Show article counts per source and month, and the last run')
  .action(async () => {
    const config = await loadConfig();
    const { stats, lastRun } = await withDb(config, async (db) => ({
      stats: articleStats(db),
      lastRun: listRunEvents(db, 1).at(0),
    }));

    log(`Articles stored: ${stats.total}`);
    if (stats.bySource.length > 0) {
      log('\nBy source:');
      for (const row of stats.bySource) log(`  ${row.source.padEnd(20)} ${row.count}`);
    }
    if (stats.byMonth.length > 0) {
      log('\nBy month:');
      for (const row of stats.byMonth) log(`  ${row.month}  ${row.count}`);
    }
    if (lastRun) {
      log(
        `\nLast run ${lastRun.created_at}: ${lastRun.providers_processed}/${lastRun.providers_total} providers ok, ` +
          `${lastRun.providers_failed} failed, ${lastRun.articles_written} articles written in ${lastRun.duration_ms}ms`,
      );
    }
  });

function selectProviders(all: ProviderSpec[], names: string[] | undefined): ProviderSpec[] {
  if (!names || names.length === 0) return all;
  const wanted = new Set(names.map((n) => n.toLowerCase()));
  const selected = all.filter((p) => wanted.has(p.name.toLowerCase()));
  if (selected.length < wanted.size) {
    const known = new Set(selected.map((p) => p.name.toLowerCase()));
    const missing = names.filter((n) => !known.has(n.toLowerCase()));
    log(`Unknown providers ignored: ${missing.join(', ')}`);
  }
  return selected;
}

function printReport(report: CycleReport, dryRun: boolean): void {
  log(`\nDiscovery complete${dryRun ? ' (dry run)' : ''}:`);
  log(`  Providers processed: ${report.providersProcessed}`);
  log(`  Providers failed:    ${report.providersFailed}`);
  log(`  New articles:        ${report.articles.length}`);
  log(`  Articles written:    ${report.articlesWritten}`);
  log(`  Duration:            ${report.durationMs}ms`);

  const problems = report.outcomes.filter((o) => o.status !== 'ok');
  if (problems.length > 0) {
    log('\nProblems:');
    for (const o of problems) {
      log(`  ${o.provider}: ${o.status}${o.error ? ` (${o.error})` : ''}`);
    }
  }

  if (dryRun) {
    for (const a of report.articles) {
      log(`  ${a.date || '----------'} [${a.source}] ${a.title} ${a.link}`);
    }
  }
}

// === Helper to scope a DB connection ===
async function withDb<T>(
  config: Config,
  fn: (db: ReturnType<typeof openDb>) => Promise<T>,
): Promise<T> {
  const db = openDb(config.db.path);
  try {
    runMigrations(db);
    return await fn(db);
  } finally {
    closeDb(db);
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
