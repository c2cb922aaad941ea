export * from './item.js';
export * from './role.js';
