/**
 * Exclusion CLI — Configuration Resolution
 *
 * Each setting resolves from, in order: an explicit command-line flag, an
 * environment variable, the default.
 *
 *   trace   --trace / --no-trace   EXCLUSIONS_TRACE      default off
 *   cache   --cache / --no-cache   EXCLUSIONS_NO_CACHE   default on
 */

export interface CliFlags {
  readonly trace?: boolean | undefined;
  readonly cache?: boolean | undefined;
}

export interface CliConfig {
  readonly trace: boolean;
  readonly cache: boolean;
}

export const DEFAULT_CLI_CONFIG: CliConfig = {
  trace: false,
  cache: true,
};

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return TRUTHY.has(value.trim().toLowerCase());
}

export function resolveCliConfig(
  flags: CliFlags,
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  const envNoCache = envFlag(env['EXCLUSIONS_NO_CACHE']);
  return {
    trace: flags.trace ?? envFlag(env['EXCLUSIONS_TRACE']) ?? DEFAULT_CLI_CONFIG.trace,
    cache: flags.cache ?? (envNoCache === undefined ? undefined : !envNoCache) ?? DEFAULT_CLI_CONFIG.cache,
  };
}
