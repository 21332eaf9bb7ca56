/**
 * Tools Module
 *
 * Functions the realtime model can call during a conversation.
 */

export * from './base-tool.js';
export * from './tool-definition.js';
export * from './tool-registry.js';
export * from './default-tools.js';
export * from './weather/index.js';
