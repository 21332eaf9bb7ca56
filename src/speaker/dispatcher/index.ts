export * from './async-queue.js';
export * from './command-dispatcher.js';
