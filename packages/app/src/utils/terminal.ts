export const ANSI = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
  bold: '\x1b[1m'
} as const;

export type AnsiColor = keyof typeof ANSI;

export function useColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  return process.stdout.isTTY === true;
}

export function paint(text: string, color: AnsiColor, enabled: boolean): string {
  return enabled ? `${ANSI[color]}${text}${ANSI.reset}` : text;
}

/** Where command output goes; process.stdout in production, a buffer in tests. */
export interface Output {
  write(text: string): unknown;
}

export function writeLine(stream: Output, line: string): void {
  stream.write(`${line}\n`);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
