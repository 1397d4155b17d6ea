export * from './constants.js';
export * from './types/files.js';
export * from './types/position.js';
export * from './types/render.js';
