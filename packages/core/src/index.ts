// Core exports for uipom
export * from './schema.js';
export * from './errors.js';
export * from './config.js';
export * from './locator.js';
export * from './wait.js';
export * from './logger.js';
export * from './driverFactory.js';
export * from './actionWrapper.js';
export * from './basePage.js';
export * from './session.js';
