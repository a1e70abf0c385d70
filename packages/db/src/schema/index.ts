export * from './world.js';
export * from './locations.js';
