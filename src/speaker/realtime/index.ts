/**
 * Realtime Speech API Module
 */

export * from './realtime-client.js';
export * from './transport.js';
