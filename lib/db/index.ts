export type { DatabaseConfig } from './config';
export { ENV_VARS, loadDatabaseConfig } from './config';
export type { UserRecordSet, UserStore } from './userStore';
export { MysqlUserStore, USER_COLUMNS } from './userStore';
