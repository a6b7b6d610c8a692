import { ApiError, isCancellation, setOptional } from '@feedwire/core';
import {
  type Env,
  type FeedConfigInput,
  type ResolveConfigOptions,
  type ResolvedFeedConfig,
  resolveFeedConfig
} from '@feedwire/core/config';
import { createFeedClientFromConfig, type FeedClient } from '@feedwire/sdk';
import { errorMessage, type Output, paint, useColor, writeLine } from '../utils/terminal';

/** Options every command accepts (declared once on the root parser). */
export interface GlobalOptions {
  baseUrl?: string;
  proId?: string;
  token?: string;
  config?: string;
  /** `--no-color` sets this to false. */
  color?: boolean;
}

export interface SignalTarget {
  on(event: 'SIGINT', listener: () => void): unknown;
  removeListener(event: 'SIGINT', listener: () => void): unknown;
}

/** Seams for tests; production uses the process and the network. */
export interface FeedCommandDeps {
  createClient?: (config: ResolvedFeedConfig) => FeedClient;
  env?: Env;
  cwd?: string;
  stdout?: Output;
  stderr?: Output;
  signalTarget?: SignalTarget;
  color?: boolean;
}

export interface CommandContext {
  client: FeedClient;
  config: ResolvedFeedConfig;
  stdout: Output;
  stderr: Output;
  color: boolean;
}

function overridesFrom(argv: GlobalOptions): FeedConfigInput {
  return setOptional<FeedConfigInput>({})
    .ifDefined('baseUrl', argv.baseUrl)
    .ifDefined('proId', argv.proId)
    .ifDefined('proToken', argv.token)
    .build();
}

export async function createCommandContext(
  argv: GlobalOptions,
  deps: FeedCommandDeps
): Promise<CommandContext> {
  const config = await resolveFeedConfig(
    setOptional<ResolveConfigOptions>({
      startDir: deps.cwd ?? process.cwd(),
      env: deps.env ?? process.env,
      overrides: overridesFrom(argv)
    })
      .ifDefined('configPath', argv.config)
      .build()
  );

  const createClient = deps.createClient ?? ((resolved) => createFeedClientFromConfig(resolved));
  return {
    client: createClient(config),
    config,
    stdout: deps.stdout ?? process.stdout,
    stderr: deps.stderr ?? process.stderr,
    color: (deps.color ?? useColor()) && argv.color !== false
  };
}

/** The feed owner: --pro-id, else the configured identity. */
export function requireTargetProId(ctx: CommandContext): string {
  const proId = ctx.config.proId?.trim();
  if (!proId) {
    throw new Error('a pro id is required (--pro-id, FEEDWIRE_PRO_ID or proId in feedwire.jsonc)');
  }
  return proId;
}

export function reportError(stderr: Output, error: unknown, color: boolean): void {
  const message =
    error instanceof ApiError ? `API ${error.status}: ${error.message}` : errorMessage(error);
  writeLine(stderr, `${paint('error:', 'red', color)} ${message}`);
}

async function tryCreateContext(
  argv: GlobalOptions,
  deps: FeedCommandDeps
): Promise<CommandContext | undefined> {
  try {
    return await createCommandContext(argv, deps);
  } catch (error) {
    reportError(deps.stderr ?? process.stderr, error, false);
    return undefined;
  }
}

/** Resolve the context and run a one-shot command, mapping failures to exit code 1. */
export async function runOnce(
  argv: GlobalOptions,
  deps: FeedCommandDeps,
  body: (ctx: CommandContext) => Promise<void>
): Promise<0 | 1> {
  const ctx = await tryCreateContext(argv, deps);
  if (!ctx) return 1;

  try {
    await body(ctx);
    return 0;
  } catch (error) {
    reportError(ctx.stderr, error, ctx.color);
    return 1;
  }
}

/**
 * Run a long-lived command until it finishes or Ctrl+C aborts it.
 * A cancellation caused by Ctrl+C is a clean exit.
 */
export async function runInterruptible(
  argv: GlobalOptions,
  deps: FeedCommandDeps,
  body: (ctx: CommandContext, signal: AbortSignal) => Promise<void>
): Promise<0 | 1> {
  const ctx = await tryCreateContext(argv, deps);
  if (!ctx) return 1;

  const signalTarget = deps.signalTarget ?? process;
  const controller = new AbortController();
  let interrupted = false;

  const onSigint = () => {
    interrupted = true;
    writeLine(ctx.stderr, paint('interrupted, closing stream', 'dim', ctx.color));
    controller.abort();
  };
  signalTarget.on('SIGINT', onSigint);

  try {
    await body(ctx, controller.signal);
    return 0;
  } catch (error) {
    if (interrupted && isCancellation(error)) {
      return 0;
    }
    reportError(ctx.stderr, error, ctx.color);
    return 1;
  } finally {
    signalTarget.removeListener('SIGINT', onSigint);
  }
}

export function printJson(stdout: Output, value: unknown): void {
  writeLine(stdout, JSON.stringify(value));
}

/** yargs handler tail: exit non-zero only on failure so stdout can drain. */
export async function exitWith(code: Promise<0 | 1>): Promise<void> {
  const exitCode = await code;
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}
