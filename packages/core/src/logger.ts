// ============================================================================
// Logger
// ============================================================================

export interface Logger {
  debug(message: string): void;
}

function debugEnabled(): boolean {
  if (typeof process === 'undefined' || !process.env) return false;
  return !!(process.env['FEEDWIRE_DEBUG'] || process.env['DEBUG']);
}

/**
 * Create a debug logger for a module.
 * Output is gated on FEEDWIRE_DEBUG or DEBUG.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[feedwire:${scope}]`;

  return {
    debug: (message: string) => {
      if (debugEnabled()) {
        console.debug(`${prefix} ${message}`);
      }
    }
  };
}
