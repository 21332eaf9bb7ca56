/**
 * Speaker Types
 */

export * from './speaker-configuration.js';
export * from './realtime-events.js';
export * from './commands.js';
