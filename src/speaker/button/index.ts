export * from './button-input.js';
export * from './gpio-button.js';
export * from './keyboard-button.js';
export * from './button-test.js';
