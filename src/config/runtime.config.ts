export interface RuntimeConfig {
  debug: boolean;
  allowRoot: boolean;
}

const TRUTHY = ['1', 'true', 'yes', 'on'];

export function readFlag(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback = false,
): boolean {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return fallback;
  return TRUTHY.includes(raw.toLowerCase());
}

export function getRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  return {
    debug: readFlag(env, 'PARSER_DEBUG'),
    allowRoot: readFlag(env, 'PARSER_ALLOW_ROOT'),
  };
}

export default getRuntimeConfig;
