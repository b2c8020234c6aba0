#!/usr/bin/env node

import { Command } from 'commander';
import { getConfig } from '../config/index.js';
import { RegulatoryMetricsService } from '../analysis/service.js';
import { createCachedDocumentSource } from '../sources/cached-source.js';
import { TitlesSummarySchema } from '../sources/titles-summary.js';
import { AgencyMetrics, IsoDateSchema, MetricsRecord } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { formatComplexity, formatSigned, previewText, sectionsHeader } from './format.js';

const logger = createChildLogger('metrics-cli');

const program = new Command();

function printMetrics(metrics: MetricsRecord, indent = '   '): void {
  console.log(`${indent}Word count: ${metrics.wordCount.toLocaleString('en-US')}`);
  console.log(`${indent}Checksum: ${metrics.checksum}`);
  console.log(`${indent}Complexity (FK grade): ${formatComplexity(metrics.complexity)}`);
}

function printAgency(metrics: AgencyMetrics): void {
  console.log(`\n🏛️  ${metrics.agencyName}`);
  printMetrics(metrics);
  console.log(`   Titles analyzed: ${metrics.titlesAnalyzed.join(', ')} (${metrics.titlesCount})`);
}

function fail(message: string, error: unknown): never {
  logger.error({ error }, message);
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}

function createServices() {
  const config = getConfig();
  const source = createCachedDocumentSource(config);
  return { config, source, service: new RegulatoryMetricsService(source) };
}

program
  .name('regmetrics')
  .description('Word count, checksum and readability metrics for eCFR agencies')
  .version('1.0.0');

/**
 * List agencies in the reference feed
 */
program
  .command('agencies')
  .description('List all agencies in the reference feed')
  .action(async () => {
    const { service } = createServices();
    try {
      const agencies = await service.listAgencies();
      console.log(`\n📋 Agencies (${agencies.length})\n`);
      for (const name of agencies) {
        console.log(`  ${name}`);
      }
      console.log('');
    } catch (error) {
      fail('Failed to list agencies', error);
    }
  });

/**
 * Metrics for one date
 */
program
  .command('analyze')
  .description('Compute metrics for every agency, or one agency, on a date')
  .option('-d, --date <date>', 'Effective date (YYYY-MM-DD)')
  .option('-a, --agency <name>', 'Only analyze this agency')
  .option('--json', 'Print the full report as JSON', false)
  .action(async (options: { date?: string; agency?: string; json: boolean }) => {
    const { config, service } = createServices();
    const date = options.date ?? config.analysis.defaultDate;

    try {
      const report = await service.analyze(date, options.agency);

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }

      console.log(`\n📊 Agency metrics for ${date}`);
      console.log('━'.repeat(60));

      const agencies = Object.values(report.agencies);
      if (agencies.length === 0) {
        console.log('No agency text found for this date.');
      }
      agencies.forEach(printAgency);

      const skipped = Object.entries(report.outcomes).flatMap(([name, outcomes]) =>
        outcomes
          .filter((outcome) => outcome.status === 'fetch_failed' || outcome.status === 'parse_failed')
          .map((outcome) => ({ name, outcome }))
      );
      if (skipped.length > 0) {
        console.log(`\n⚠️  Skipped titles: ${skipped.length}`);
        for (const { name, outcome } of skipped.slice(0, 10)) {
          console.log(`   ${name}: title ${outcome.titleNumber} (${outcome.status})`);
        }
        if (skipped.length > 10) {
          console.log(`   ... and ${skipped.length - 10} more`);
        }
      }

      console.log('\n' + '━'.repeat(60));
    } catch (error) {
      fail('Failed to analyze agencies', error);
    }
  });

/**
 * Chapter text for one agency
 */
program
  .command('sections <agency>')
  .description('Show the chapter headings and text attributed to an agency')
  .option('-d, --date <date>', 'Effective date (YYYY-MM-DD)')
  .option('-n, --chars <number>', 'Characters of chapter text to preview', '200')
  .option('--json', 'Print sections as JSON', false)
  .action(async (agency: string, options: { date?: string; chars: string; json: boolean }) => {
    const { config, service } = createServices();
    const date = options.date ?? config.analysis.defaultDate;

    try {
      const sections = await service.sections(agency, date);

      if (options.json) {
        console.log(JSON.stringify({ agency, sections }, null, 2));
        return;
      }

      const entries = Object.entries(sections);
      console.log(`\n${sectionsHeader(agency, date, entries.length)}`);
      console.log('━'.repeat(60));

      const previewLength = parseInt(options.chars, 10);
      for (const [heading, text] of entries) {
        console.log(`\n${heading}`);
        console.log(`   ${previewText(text, previewLength)}`);
      }

      console.log('\n' + '━'.repeat(60));
    } catch (error) {
      fail('Failed to extract sections', error);
    }
  });

/**
 * Compare metrics between dates
 */
program
  .command('history')
  .description('Compare agency metrics across one or two dates')
  .requiredOption('--dates <dates...>', 'One or two effective dates (YYYY-MM-DD)')
  .option('-a, --agency <name>', 'Only compare this agency')
  .option('--json', 'Print the history as JSON', false)
  .action(async (options: { dates: string[]; agency?: string; json: boolean }) => {
    const { service } = createServices();

    try {
      const history = await service.history(options.dates, options.agency);

      if (options.json) {
        console.log(JSON.stringify(history, null, 2));
        return;
      }

      console.log(`\n🕰️  Agency metrics over time: ${options.dates.join(' → ')}`);
      console.log('━'.repeat(60));

      for (const record of Object.values(history)) {
        console.log(`\n🏛️  ${record.agencyName}`);
        for (const [date, metrics] of Object.entries(record.snapshots)) {
          console.log(`   ${date}`);
          printMetrics(metrics, '     ');
        }
        if (record.delta) {
          console.log(`   Change: ${formatSigned(record.delta.wordCountDelta)} words, complexity ${
            record.delta.complexityDelta === null ? 'n/a' : formatSigned(Number(record.delta.complexityDelta.toFixed(2)))
          }`);
        }
      }

      console.log('\n' + '━'.repeat(60));
    } catch (error) {
      fail('Failed to compare history', error);
    }
  });

/**
 * Download a title into the data directory
 */
program
  .command('fetch <title>')
  .description('Download a title\'s XML for a date into the data directory')
  .option('-d, --date <date>', 'Effective date (YYYY-MM-DD)')
  .action(async (title: string, options: { date?: string }) => {
    const { config, source } = createServices();
    const titleNumber = parseInt(title, 10);
    const date = IsoDateSchema.safeParse(options.date ?? config.analysis.defaultDate);

    if (isNaN(titleNumber) || titleNumber <= 0) {
      console.error(`Invalid title number: ${title}`);
      process.exit(1);
    }
    if (!date.success) {
      console.error(`Invalid date: ${options.date}`);
      process.exit(1);
    }

    const ok = await source.fetchDocument(titleNumber, date.data);
    if (!ok) {
      console.error(`❌ Failed to download title ${titleNumber} for ${date.data}`);
      process.exit(1);
    }
    console.log(`✓ Downloaded title ${titleNumber} for ${date.data}`);
  });

/**
 * Re-download the agencies feed
 */
program
  .command('refresh-agencies')
  .description('Re-download the agencies reference feed')
  .action(async () => {
    const { source } = createServices();
    try {
      await source.refreshReferenceMetadata();
      console.log('✓ Agencies feed saved');
    } catch (error) {
      fail('Failed to refresh agencies feed', error);
    }
  });

/**
 * Titles and their latest issue dates
 */
program
  .command('titles')
  .description('List CFR titles and their latest issue dates')
  .action(async () => {
    const { source } = createServices();
    try {
      const summary = TitlesSummarySchema.parse(await source.getTitlesSummary());

      console.log('\n📚 CFR Titles\n');
      for (const title of summary.titles) {
        const status = title.reserved ? ' (reserved)' : '';
        console.log(`  ${String(title.number).padStart(2)}  ${title.name}${status}`);
        if (title.latest_issue_date) {
          console.log(`      Latest issue: ${title.latest_issue_date}`);
        }
      }
      console.log('');
    } catch (error) {
      fail('Failed to list titles', error);
    }
  });

program.parseAsync().catch((error: unknown) => fail('Command failed', error));
