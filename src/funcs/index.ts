// src/funcs/index.ts

export * from './format-checkers.js';
export * from './network.js';
export * from './jalaali.js';
