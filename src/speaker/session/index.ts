export * from './voice-session.js';
export * from './send-audio.js';
