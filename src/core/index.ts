/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, symbols, type LogLevel } from './Logger.js';
export { EventBus, eventBus, EventTypes, type EventType, type EventPayloadMap } from './EventBus.js';
export * from './errors.js';
export { Application, createApplication, type ApplicationOptions, type SpfRunOverrides } from './Application.js';
