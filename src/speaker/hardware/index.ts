/**
 * Hardware Detection Module
 */

export * from './pi-detection.js';
