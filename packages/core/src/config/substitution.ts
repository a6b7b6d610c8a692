// Matches {env:VAR_NAME}
const ENV_PATTERN = /\{env:([^}]+)\}/g;

export type Env = Record<string, string | undefined>;

function substituteEnvVars(value: string, env: Env): string {
  return value.replace(ENV_PATTERN, (_, varName: string) => env[varName.trim()] ?? '');
}

/**
 * Apply `{env:NAME}` substitutions to every string value in a parsed
 * config document. Keys are left alone; unset variables become ''.
 */
export function applySubstitutions(value: unknown, env: Env): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => applySubstitutions(item, env));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = applySubstitutions(entry, env);
    }
    return result;
  }

  return value;
}
