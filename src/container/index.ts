/**
 * @fileoverview Barrel export for the DI container.
 * @module src/container/index
 */
import 'reflect-metadata';

export { container } from 'tsyringe';
export * from './tokens.js';
export { registerAll } from './registrations.js';
