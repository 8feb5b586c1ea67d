// @guildgate/protocol
// Guild entity model, permission bitsets and snapshot validation

export * from './types/index.js';
export * from './validation/index.js';
