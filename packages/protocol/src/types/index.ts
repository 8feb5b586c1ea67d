// Re-export all protocol types

export * from './common.js';
export * from './permissions.js';
export * from './guild.js';
