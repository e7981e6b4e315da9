import path from 'node:path';

export const DEFAULT_CONFIG_FILENAME = 'streamnorm.config.yaml';

export interface EnvConfig {
  /**
   * Path to the models configuration file (YAML or JSON).
   */
  configPath: string;
  /**
   * Enable debug logging.
   */
  debug: boolean;
  /**
   * Forward thinking text as thinking_delta events by default.
   */
  keepThinking: boolean;
}

function readFlag(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1';
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const configEnv = env['STREAMNORM_CONFIG'];
  const configPath =
    configEnv && configEnv.trim().length > 0
      ? path.resolve(configEnv.trim())
      : path.resolve(process.cwd(), DEFAULT_CONFIG_FILENAME);

  return {
    configPath,
    debug: readFlag(env['STREAMNORM_DEBUG']),
    keepThinking: readFlag(env['STREAMNORM_KEEP_THINKING']),
  };
}
