import type { Argv, CommandModule } from 'yargs';
import { renderFactsWindow } from '../utils/format';
import { writeLine } from '../utils/terminal';
import {
  exitWith,
  type FeedCommandDeps,
  type GlobalOptions,
  printJson,
  requireTargetProId,
  runInterruptible,
  runOnce
} from './common';

export interface FactsSnapshotArgs extends GlobalOptions {
  limit?: number;
  json?: boolean;
}

export interface FactsStreamArgs extends GlobalOptions {
  json?: boolean;
}

export async function runFactsSnapshot(
  argv: FactsSnapshotArgs,
  deps: FeedCommandDeps = {}
): Promise<0 | 1> {
  return runOnce(argv, deps, async (ctx) => {
    const proId = requireTargetProId(ctx);
    const window = await ctx.client.getFactsSnapshot(
      proId,
      argv.limit !== undefined ? { limit: argv.limit } : {}
    );

    if (argv.json) {
      printJson(ctx.stdout, window);
      return;
    }
    for (const line of renderFactsWindow('snapshot', window, ctx.color)) {
      writeLine(ctx.stdout, line);
    }
  });
}

/** Print every facts window until the server closes the stream or Ctrl+C. */
export async function runFactsStream(
  argv: FactsStreamArgs,
  deps: FeedCommandDeps = {}
): Promise<0 | 1> {
  return runInterruptible(argv, deps, async (ctx, signal) => {
    const proId = requireTargetProId(ctx);
    await ctx.client.streamFacts({ proId, signal }, (window) => {
      if (argv.json) {
        printJson(ctx.stdout, window);
        return;
      }
      for (const line of renderFactsWindow('facts', window, ctx.color)) {
        writeLine(ctx.stdout, line);
      }
    });
  });
}

const snapshotCommand: CommandModule<GlobalOptions, FactsSnapshotArgs> = {
  command: 'snapshot',
  describe: 'Print the current facts window',
  builder: (yargs) =>
    yargs
      .option('limit', { type: 'number', describe: 'Maximum number of items' })
      .option('json', { type: 'boolean', default: false, describe: 'Print raw JSON' }),
  handler: (argv) => exitWith(runFactsSnapshot(argv))
};

const streamCommand: CommandModule<GlobalOptions, FactsStreamArgs> = {
  command: 'stream',
  describe: 'Follow the facts stream until interrupted',
  builder: (yargs) =>
    yargs.option('json', {
      type: 'boolean',
      default: false,
      describe: 'Print one JSON document per event'
    }),
  handler: (argv) => exitWith(runFactsStream(argv))
};

export const factsCommand: CommandModule<GlobalOptions, GlobalOptions> = {
  command: 'facts',
  describe: 'Read the facts feed',
  builder: (yargs: Argv<GlobalOptions>) =>
    yargs.command(snapshotCommand).command(streamCommand).demandCommand(1),
  handler: () => {}
};
