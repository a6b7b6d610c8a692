import {
  cursorOf,
  MATCHING_DIRECTIONS,
  type MatchFilters,
  type MatchingDirection,
  type StreamCursor
} from '@feedwire/sdk';
import type { Argv, CommandModule } from 'yargs';
import { type AnyMatchesWindow, renderMatchesWindow } from '../utils/format';
import { writeLine } from '../utils/terminal';
import {
  type CommandContext,
  exitWith,
  type FeedCommandDeps,
  type GlobalOptions,
  printJson,
  requireTargetProId,
  runInterruptible,
  runOnce
} from './common';

export interface MatchesFilterArgs {
  minScore?: number;
  limit?: number;
  minRationaleLength?: number;
  maxRationaleLength?: number;
  json?: boolean;
}

export interface MatchesSnapshotArgs extends GlobalOptions, MatchesFilterArgs {
  direction: MatchingDirection;
}

export interface MatchesStreamArgs extends MatchesSnapshotArgs {
  sinceUpdatedUtc?: string;
  sinceId?: number;
}

function filtersOf(argv: MatchesFilterArgs): MatchFilters {
  const filters: MatchFilters = {};
  if (argv.minScore !== undefined) filters.minScore = argv.minScore;
  if (argv.limit !== undefined) filters.limit = argv.limit;
  if (argv.minRationaleLength !== undefined) filters.minRationaleLength = argv.minRationaleLength;
  if (argv.maxRationaleLength !== undefined) filters.maxRationaleLength = argv.maxRationaleLength;
  return filters;
}

function explicitCursor(argv: MatchesStreamArgs): StreamCursor | undefined {
  if (argv.sinceUpdatedUtc === undefined) {
    if (argv.sinceId !== undefined) {
      throw new Error('--since-id requires --since-updated-utc');
    }
    return undefined;
  }
  const updatedUtc = new Date(argv.sinceUpdatedUtc);
  if (Number.isNaN(updatedUtc.getTime())) {
    throw new Error(`invalid --since-updated-utc '${argv.sinceUpdatedUtc}'`);
  }
  return { updatedUtc, id: argv.sinceId ?? 0 };
}

function printWindow(
  ctx: CommandContext,
  label: string,
  window: AnyMatchesWindow,
  json: boolean | undefined
): void {
  if (json) {
    printJson(ctx.stdout, window);
    return;
  }
  for (const line of renderMatchesWindow(label, window, ctx.color)) {
    writeLine(ctx.stdout, line);
  }
}

export async function runMatchesSnapshot(
  argv: MatchesSnapshotArgs,
  deps: FeedCommandDeps = {}
): Promise<0 | 1> {
  return runOnce(argv, deps, async (ctx) => {
    const proId = requireTargetProId(ctx);
    const snapshot = await ctx.client.getMatchesSnapshot(proId, {
      direction: argv.direction,
      ...filtersOf(argv)
    });
    printWindow(ctx, 'snapshot', snapshot, argv.json);
  });
}

/**
 * Follow the matches stream. Without --since-updated-utc the current
 * snapshot is printed first and the stream resumes from its cursor.
 */
export async function runMatchesStream(
  argv: MatchesStreamArgs,
  deps: FeedCommandDeps = {}
): Promise<0 | 1> {
  return runInterruptible(argv, deps, async (ctx, signal) => {
    const proId = requireTargetProId(ctx);
    const filters = filtersOf(argv);

    let cursor = explicitCursor(argv);
    if (!cursor) {
      const snapshot = await ctx.client.getMatchesSnapshot(proId, {
        direction: argv.direction,
        signal,
        ...filters
      });
      printWindow(ctx, 'snapshot', snapshot, argv.json);
      cursor = cursorOf(snapshot);
    }

    await ctx.client.streamMatches(
      { proId, cursor, direction: argv.direction, signal, ...filters },
      (window) => printWindow(ctx, 'matches', window, argv.json)
    );
  });
}

function withFilters<T extends GlobalOptions>(yargs: Argv<T>) {
  return yargs
    .option('direction', {
      type: 'string',
      choices: MATCHING_DIRECTIONS,
      demandOption: true,
      describe: 'Matching direction'
    })
    .option('min-score', { type: 'number', describe: 'Minimum match score' })
    .option('limit', { type: 'number', describe: 'Maximum number of items' })
    .option('min-rationale-length', { type: 'number', describe: 'Minimum rationale length' })
    .option('max-rationale-length', { type: 'number', describe: 'Maximum rationale length' })
    .option('json', { type: 'boolean', default: false, describe: 'Print raw JSON' });
}

const snapshotCommand: CommandModule<GlobalOptions, MatchesSnapshotArgs> = {
  command: 'snapshot',
  describe: 'Print the current matches window',
  builder: (yargs) => withFilters(yargs),
  handler: (argv) => exitWith(runMatchesSnapshot(argv))
};

const streamCommand: CommandModule<GlobalOptions, MatchesStreamArgs> = {
  command: 'stream',
  describe: 'Follow the matches stream until interrupted',
  builder: (yargs) =>
    withFilters(yargs)
      .option('since-updated-utc', {
        type: 'string',
        describe: 'Resume after this timestamp (RFC 3339)'
      })
      .option('since-id', { type: 'number', describe: 'Resume after this id' }),
  handler: (argv) => exitWith(runMatchesStream(argv))
};

export const matchesCommand: CommandModule<GlobalOptions, GlobalOptions> = {
  command: 'matches',
  describe: 'Read the matches feed',
  builder: (yargs: Argv<GlobalOptions>) =>
    yargs.command(snapshotCommand).command(streamCommand).demandCommand(1),
  handler: () => {}
};
