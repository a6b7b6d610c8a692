import type { Argv, CommandModule } from 'yargs';
import { paint, writeLine } from '../utils/terminal';
import {
  exitWith,
  type FeedCommandDeps,
  type GlobalOptions,
  printJson,
  requireTargetProId,
  runOnce
} from './common';

export interface WalletCreateArgs extends GlobalOptions {
  adminKey?: string;
  json?: boolean;
}

export interface WalletVerifyArgs extends GlobalOptions {
  json?: boolean;
}

export async function runWalletCreate(
  argv: WalletCreateArgs,
  deps: FeedCommandDeps = {}
): Promise<0 | 1> {
  return runOnce(argv, deps, async (ctx) => {
    const wallet = await ctx.client.createProWallet(
      argv.adminKey !== undefined ? { adminKey: argv.adminKey } : {}
    );

    if (argv.json) {
      printJson(ctx.stdout, wallet);
      return;
    }
    writeLine(ctx.stdout, `${paint('proId', 'bold', ctx.color)}      ${wallet.proId}`);
    writeLine(ctx.stdout, `${paint('token', 'bold', ctx.color)}      ${wallet.token}`);
    writeLine(ctx.stdout, `${paint('mnemonic', 'bold', ctx.color)}   ${wallet.mnemonic24}`);
    writeLine(ctx.stdout, `${paint('created', 'bold', ctx.color)}    ${wallet.createdUtc}`);
    writeLine(ctx.stdout, paint('Store the mnemonic now; it is not shown again.', 'yellow', ctx.color));
  });
}

/** Exit code 1 when the server reports the credentials as invalid. */
export async function runWalletVerify(
  argv: WalletVerifyArgs,
  deps: FeedCommandDeps = {}
): Promise<0 | 1> {
  let valid = false;
  const code = await runOnce(argv, deps, async (ctx) => {
    const proId = requireTargetProId(ctx);
    const token = ctx.config.proToken?.trim();
    if (!token) {
      throw new Error('a token is required (--token, FEEDWIRE_PRO_TOKEN or proToken in feedwire.jsonc)');
    }

    const result = await ctx.client.verifyProWallet(proId, token);
    valid = result.valid;

    if (argv.json) {
      printJson(ctx.stdout, result);
      return;
    }
    writeLine(
      ctx.stdout,
      result.valid
        ? `${paint('valid', 'green', ctx.color)} ${result.proId}`
        : `${paint('invalid', 'red', ctx.color)} ${result.proId || proId}`
    );
  });
  return code === 0 && !valid ? 1 : code;
}

const createCommand: CommandModule<GlobalOptions, WalletCreateArgs> = {
  command: 'create',
  describe: 'Create a pro wallet and print its credentials',
  builder: (yargs) =>
    yargs
      .option('admin-key', { type: 'string', describe: 'Admin key sent as X-Manax-Key' })
      .option('json', { type: 'boolean', default: false, describe: 'Print raw JSON' }),
  handler: (argv) => exitWith(runWalletCreate(argv))
};

const verifyCommand: CommandModule<GlobalOptions, WalletVerifyArgs> = {
  command: 'verify',
  describe: 'Check that the configured pro id and token are valid',
  builder: (yargs) =>
    yargs.option('json', { type: 'boolean', default: false, describe: 'Print raw JSON' }),
  handler: (argv) => exitWith(runWalletVerify(argv))
};

export const walletCommand: CommandModule<GlobalOptions, GlobalOptions> = {
  command: 'wallet',
  describe: 'Create or verify pro wallet credentials',
  builder: (yargs: Argv<GlobalOptions>) =>
    yargs.command(createCommand).command(verifyCommand).demandCommand(1),
  handler: () => {}
};
