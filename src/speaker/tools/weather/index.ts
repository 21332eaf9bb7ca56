export * from './openweathermap.js';
export * from './weather-tool.js';
