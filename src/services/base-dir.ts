import { homedir } from 'node:os';
import { join } from 'node:path';
import { LoggerEnvSchema } from './env-schemas';

/**
 * Expand environment variables in a string.
 * Handles $VAR and ${VAR} syntax; unknown variables are left as written.
 */
function expandEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{?([A-Z_][A-Z0-9_]*)\}?/gi, (match, varName: string) => {
    const envValue = env[varName];
    return envValue !== undefined ? expandEnvVars(envValue, env) : match;
  });
}

/**
 * Base directory for client data (logs). BASE_DIR when set, with variables
 * expanded, otherwise ~/.channelterm.
 */
export function resolveBaseDir(env: NodeJS.ProcessEnv = process.env): string {
  const { BASE_DIR } = LoggerEnvSchema.parse(env);
  return BASE_DIR ? expandEnvVars(BASE_DIR, env) : join(homedir(), '.channelterm');
}
