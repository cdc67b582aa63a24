/**
 * Services module exports
 */
export * from './RecordValidator.js';
export * from './SpfChainGenerator.js';
export * from './SpfChainPlanner.js';
export * from './TemplatePlanner.js';
export * from './ReconciliationEngine.js';
export * from './BulkOrchestrator.js';
export * from './NameserverMonitor.js';
export * from './RecordExporter.js';
export * from './RecordBackup.js';
