export { createDatabase, type Database } from './db.js';
export * from './schema/index.js';
export * from './repositories/index.js';
