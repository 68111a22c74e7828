#!/usr/bin/env node
/**
 * Recap Context Engine - Main Entry Point
 * Reads a batch of event lines, assembles bounded context and writes one
 * round of commentary
 */

import 'dotenv/config';
import { createReadStream } from 'fs';
import * as readline from 'readline';
import { ConfigError, loadConfig } from './config.js';
import { createEngine } from './engine.js';
import { AssemblyError } from './utils/errors.js';
import { describeError } from './utils/logger.js';

const USAGE = [
  'Usage:',
  '  recap-context run <owner-key> [events-file]   one commentary cycle (lines from file or stdin)',
  '  recap-context stats <owner-key>               history, memory and entity statistics',
  '  recap-context cleanup [days]                  drop memories and entity events older than days (default 90)'
].join('\n');

async function readLines(file?: string): Promise<string[]> {
  const rl = readline.createInterface({
    input: file ? createReadStream(file, { encoding: 'utf8' }) : process.stdin,
    crlfDelay: Infinity
  });

  const lines: string[] = [];
  for await (const line of rl) {
    lines.push(line);
  }
  return lines;
}

async function main(argv: string[]): Promise<number> {
  const [command, ...args] = argv;
  if (!command || command === '--help' || command === '-h') {
    console.log(USAGE);
    return command ? 0 : 1;
  }

  const config = loadConfig();
  const engine = createEngine(config);

  try {
    switch (command) {
      case 'run': {
        const [ownerKey, file] = args;
        if (!ownerKey) {
          console.error(USAGE);
          return 1;
        }

        const lines = await readLines(file);
        const outcome = await engine.cycle.run(ownerKey, lines);

        if (outcome.status === 'skipped') {
          console.log(`Skipped ${ownerKey}: ${outcome.reason}`);
          return 0;
        }

        const { allocation, tiers } = outcome.context;
        console.log(
          `[${allocation.promptTokens}/${config.budget.contextWindow} prompt tokens, num_predict=${allocation.numPredict}, ` +
          `history=${tiers.history.status}, memories=${tiers.memories.status}, entities=${tiers.entityContext.status}]`
        );

        if (outcome.status === 'generation-failed') {
          console.error(`Error: Unable to get commentary from the generator (${outcome.error})`);
          return 1;
        }
        return outcome.delivered ? 0 : 1;
      }

      case 'stats': {
        const [ownerKey] = args;
        if (!ownerKey) {
          console.error(USAGE);
          return 1;
        }

        const history = engine.threads.getContextStatistics(ownerKey);
        const memory = engine.memories.getStats();
        const active = engine.profiles.getMostActiveEntities(ownerKey, 5);

        console.log(`History for ${ownerKey}`);
        console.log(`  Summaries: ${history.totalSummaries} (${history.recentSummaries7d} in the last 7 days)`);
        console.log(`  Coverage: ${history.coverageDays} days (${history.earliestSummary ?? '-'} to ${history.latestSummary ?? '-'})`);
        console.log(`Semantic memory: ${memory.enabled ? 'enabled' : 'disabled'}`);
        console.log(`  Memories: ${memory.memoriesByOwner[ownerKey] ?? 0} for this owner, ${memory.totalMemories} total`);
        console.log(`  Model: ${memory.embeddingModel ?? '-'} (${memory.dimensions ?? '?'} dimensions)`);
        console.log('Most active entities:');
        for (const entity of active) {
          console.log(`  ${entity.entityName} (${entity.eventCount} events): ${entity.context}`);
        }
        return 0;
      }

      case 'cleanup': {
        const days = args[0] === undefined ? 90 : Number.parseInt(args[0], 10);
        if (!Number.isInteger(days) || days < 0) {
          console.error(`Invalid number of days: ${args[0]}`);
          return 1;
        }

        const memories = engine.memories.cleanupOlderThan(days);
        const events = engine.profiles.pruneEventsOlderThan(days);
        console.log(`Removed ${memories} memories and ${events} entity events older than ${days} days`);
        return 0;
      }

      default:
        console.error(`Unknown command: ${command}\n\n${USAGE}`);
        return 1;
    }
  } finally {
    engine.close();
  }
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(error.message);
    } else if (error instanceof AssemblyError) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('Fatal error:', describeError(error));
      if (process.env.DEBUG !== 'true') {
        console.error('    (Run with DEBUG=true for more details)');
      } else if (error instanceof Error && error.stack) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  });
