import { readFileSync, existsSync } from 'fs';

/**
 * Read a secret from Docker secrets or fall back to environment variable.
 * Docker secrets are mounted at /run/secrets/<name> in containers.
 */
export function getSecret(name: string, fallbackEnv?: string, env: NodeJS.ProcessEnv = process.env): string {
  const secretPath = `/run/secrets/${name}`;
  const fallback = fallbackEnv ? env[fallbackEnv] : undefined;

  if (existsSync(secretPath)) {
    try {
      return readFileSync(secretPath, 'utf8').trim();
    } catch {
      // Unreadable secret file: the env fallback still wins if present
      if (fallback) {
        return fallback;
      }
      throw new Error(`Secret "${name}" exists but could not be read at ${secretPath}`);
    }
  }

  if (fallback) {
    return fallback;
  }

  throw new Error(`Secret "${name}" not found at ${secretPath} and no fallback provided`);
}

/**
 * Read an optional secret - returns undefined if not found.
 */
export function getOptionalSecret(
  name: string,
  fallbackEnv?: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  try {
    return getSecret(name, fallbackEnv, env);
  } catch {
    return undefined;
  }
}
