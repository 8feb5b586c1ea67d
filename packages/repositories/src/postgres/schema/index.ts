// Re-export all schema tables
export * from './guilds.js';
export * from './roles.js';
export * from './members.js';
export * from './channels.js';
