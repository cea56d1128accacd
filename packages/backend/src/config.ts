export interface Config {
  port: number;
  database_url: string;
  node_env: string;
  api_key: string;
  log_level: 'debug' | 'info' | 'warn' | 'error';
}

const LOG_LEVELS: ReadonlyArray<Config['log_level']> = ['debug', 'info', 'warn', 'error'];

function get_env(key: string, default_value?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (default_value !== undefined) {
      return default_value;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function parse_log_level(value: string): Config['log_level'] {
  const match = LOG_LEVELS.find((level) => level === value.toLowerCase());
  return match ?? 'info';
}

export function load_config(): Config {
  return {
    port: parseInt(get_env('PORT', '4000'), 10),
    database_url: get_env('DATABASE_URL'),
    node_env: get_env('NODE_ENV', 'development'),
    api_key: get_env('API_KEY'),
    log_level: parse_log_level(get_env('LOG_LEVEL', 'info')),
  };
}

export const config = load_config();
