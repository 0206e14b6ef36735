/**
 * Environment references in configuration values
 *
 * `${NAME}` expands to the variable's value, `${NAME:-fallback}` to the
 * fallback when NAME is unset. An unset variable without fallback expands to
 * the empty string; a variable set to the empty string stays empty.
 */

const ENV_REFERENCE = /\$\{([^}:]+)(?::-([^}]*))?\}/g;

export type Environment = Readonly<Record<string, string | undefined>>;

export function expandString(value: string, env: Environment): string {
  return value.replace(ENV_REFERENCE, (_match, name: string, fallback: string | undefined) => {
    return env[name] ?? fallback ?? '';
  });
}

/**
 * Expands references in every string of a parsed YAML document, at any depth
 */
export function expandEnvVars(value: unknown, env: Environment): unknown {
  if (typeof value === 'string') {
    return expandString(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => expandEnvVars(item, env));
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]: [string, unknown]) => [key, expandEnvVars(item, env)])
    );
  }
  return value;
}
