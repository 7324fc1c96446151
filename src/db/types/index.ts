export * from './enums.js';
export * from './item.js';
export * from './skill.js';
export * from './character.js';
export * from './enemy.js';
export * from './event.js';
export * from './combat.js';
