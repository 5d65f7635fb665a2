#!/usr/bin/env node
/**
 * filtered-logger CLI
 *
 * Reads every row of the `users` table and logs it as one `key=value;` line,
 * with PII fields redacted by the user_data logger.
 *
 * Environment variables:
 *   PERSONAL_DATA_DB_NAME      (required) Database name
 *   PERSONAL_DATA_DB_USERNAME  Database user (default: root)
 *   PERSONAL_DATA_DB_PASSWORD  Database password (default: empty)
 *   PERSONAL_DATA_DB_HOST      Database host (default: localhost)
 */
import type { BaseLogger } from './core/types';
import { getUserDataLogger } from './core/logger';
import { loadDatabaseConfig, type DatabaseConfig } from './db/config';
import { MysqlUserStore, type UserStore } from './db/userStore';
import { DEFAULT_ASSIGNMENT, DEFAULT_SEPARATOR } from './redaction/config';

export const VERSION = '0.1.0';

const HELP = `
filtered-logger v${VERSION}
Logs the users table with PII fields redacted

USAGE:
  filtered-logger [options]

OPTIONS:
  --version          Show version
  --help             Show this help message

ENVIRONMENT VARIABLES:
  PERSONAL_DATA_DB_NAME       (required) Database name
  PERSONAL_DATA_DB_USERNAME   Database user (default: root)
  PERSONAL_DATA_DB_PASSWORD   Database password (default: empty)
  PERSONAL_DATA_DB_HOST       Database host (default: localhost)
`;

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  connect?: (config: DatabaseConfig) => Promise<UserStore>;
  logger?: BaseLogger;
  print?: (text: string) => void;
}

const pad = (value: number): string => String(value).padStart(2, '0');

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (value instanceof Date) {
    const date = `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
    return `${date} ${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return String(value);
}

/**
 * Renders one row as `col=value;col=value;`, columns in the given order.
 */
export function formatRowMessage(
  columns: readonly string[],
  row: Record<string, unknown>,
  separator: string = DEFAULT_SEPARATOR,
  assignment: string = DEFAULT_ASSIGNMENT,
): string {
  return columns.map(column => `${column}${assignment}${formatValue(row[column])}${separator}`).join('');
}

/**
 * Runs the CLI and resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text));

  if (argv.includes('--help') || argv.includes('-h')) {
    print(HELP);
    return 0;
  }
  if (argv.includes('--version')) {
    print(VERSION);
    return 0;
  }

  const logger = deps.logger ?? getUserDataLogger();
  const connect = deps.connect ?? ((config: DatabaseConfig) => MysqlUserStore.connect(config));

  let store: UserStore | undefined;
  try {
    store = await connect(loadDatabaseConfig(deps.env ?? process.env));
    const { columns, rows } = await store.listUsers();
    for (const row of rows) {
      logger.info(formatRowMessage(columns, row));
    }
    return 0;
  } catch (error) {
    logger.error(`Failed to read users: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  } finally {
    if (store) {
      try {
        await store.close();
      } catch (error) {
        logger.warn(`Failed to close user store: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    await logger.flushAll();
  }
}

if (require.main === module) {
  void runCli(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  });
}
