export * from './constants.js';
export * from './types/position.js';
export * from './types/world.js';
export * from './types/location.js';
