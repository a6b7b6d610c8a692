import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { factsCommand } from './cmd/facts';
import { matchesCommand } from './cmd/matches';
import { walletCommand } from './cmd/wallet';
import { VERSION } from './version';

export async function cli(args: string[]): Promise<void> {
  await yargs(hideBin(['node', 'cli', ...args]))
    .scriptName('feedwire')
    .usage('$0 <command> [options]')
    .option('base-url', { type: 'string', describe: 'Service base URL' })
    .option('pro-id', { type: 'string', describe: 'Pro id (feed owner and identity header)' })
    .option('token', { type: 'string', describe: 'Pro token sent as X-Pro-Token' })
    .option('config', { type: 'string', describe: 'Path to feedwire.jsonc' })
    .option('color', { type: 'boolean', describe: 'Coloured output (--no-color to disable)' })
    .command(factsCommand)
    .command(matchesCommand)
    .command(walletCommand)
    .demandCommand(1, 'You need to specify a command')
    .strict()
    .help()
    .version(VERSION)
    .parseAsync();
}
