export type { LogFormatter } from '../core/types';
