export type { ISessionLog } from './interface.js';
export { SQLiteSessionLog } from './sqlite.js';
