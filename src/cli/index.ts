#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { parseLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../types/index.js';
import { queryCommand, runCommand, VERSION, type QueryOptions, type RunOptions } from './commands.js';

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function parseLevel(value: string): LogLevel {
    const level = parseLogLevel(value);
    if (!level) {
        throw new InvalidArgumentError('Must be one of: debug, info, warn, error, silent.');
    }
    return level;
}

const program = new Command();

program
    .name('paperfeed')
    .description('Find new arXiv papers for your keywords, summarize them with Gemini, and record them in Notion.')
    .version(VERSION);

// ─── RUN command ──────────────────────────────────────────

program
    .command('run')
    .description('Run one ingestion pass')
    .option('-c, --config <path>', 'Config file path (default: search for paperfeed.config.json)')
    .option('-d, --lookback-days <n>', 'Days to look back', parsePositiveInt)
    .option('-m, --max-results <n>', 'Maximum search results to read', parsePositiveInt)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: RunOptions) => {
        process.exitCode = await runCommand(opts);
    });

// ─── QUERY command ────────────────────────────────────────

program
    .command('query')
    .description('Print the search query a run would send')
    .option('-c, --config <path>', 'Config file path')
    .action(async (opts: QueryOptions) => {
        process.exitCode = await queryCommand(opts);
    });

await program.parseAsync(process.argv);
