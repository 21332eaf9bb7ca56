/**
 * Audio Module
 *
 * Microphone capture, speaker playback and WAV handling over ALSA.
 */

export * from './audio-process.js';
export * from './audio-capture.js';
export * from './audio-player.js';
export * from './wav.js';
