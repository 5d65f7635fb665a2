import { createConnection, type Connection, type RowDataPacket } from 'mysql2/promise';
import type { DatabaseConfig } from './config';

/** Columns of the `users` table, in table order. */
export const USER_COLUMNS = [
  'name',
  'email',
  'phone',
  'ssn',
  'password',
  'ip',
  'last_login',
  'user_agent',
] as const;

/**
 * Result of a read against the user table: column names in select order and
 * one record per row keyed by those names.
 */
export interface UserRecordSet {
  columns: string[];
  rows: Record<string, unknown>[];
}

/**
 * Read access to stored user records.
 */
export interface UserStore {
  listUsers(): Promise<UserRecordSet>;
  close(): Promise<void>;
}

/**
 * UserStore backed by a single MySQL connection.
 */
export class MysqlUserStore implements UserStore {
  private constructor(private readonly connection: Connection) {}

  static async connect(config: DatabaseConfig): Promise<MysqlUserStore> {
    const connection = await createConnection({
      host: config.host,
      user: config.user,
      password: config.password,
      database: config.database,
      // DATETIME columns come back as the stored wall-clock time, whatever the host zone.
      timezone: 'Z',
    });
    return new MysqlUserStore(connection);
  }

  async listUsers(): Promise<UserRecordSet> {
    const [rows, fields] = await this.connection.query<RowDataPacket[]>('SELECT * FROM users;');
    return {
      columns: fields.map(field => field.name),
      rows: rows.map(row => ({ ...row })),
    };
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}
