/**
 * Connection settings for the user database, read from the environment.
 */
import { ConfigError } from '../core/errors';

export interface DatabaseConfig {
  user: string;
  password: string;
  host: string;
  database: string;
}

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  USERNAME: 'PERSONAL_DATA_DB_USERNAME',
  PASSWORD: 'PERSONAL_DATA_DB_PASSWORD',
  HOST: 'PERSONAL_DATA_DB_HOST',
  NAME: 'PERSONAL_DATA_DB_NAME',
} as const;

/**
 * Load database configuration from environment variables.
 *
 * @throws ConfigError if PERSONAL_DATA_DB_NAME is missing or empty
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const database = env[ENV_VARS.NAME];
  if (!database) {
    throw new ConfigError(`Missing required environment variable: ${ENV_VARS.NAME}`);
  }

  return {
    user: env[ENV_VARS.USERNAME] ?? 'root',
    password: env[ENV_VARS.PASSWORD] ?? '',
    host: env[ENV_VARS.HOST] ?? 'localhost',
    database,
  };
}
