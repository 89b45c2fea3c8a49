/**
 * scene-batch public API
 */

export * from './core/types.js';
export * from './core/assets.js';
export * from './core/errors.js';
export * from './catalog/scene-catalog.js';
export { SceneClassifier, type SceneClassification } from './scene/scene-classifier.js';
export {
  inspectScene,
  validateScene,
  isArchiveIntact,
  type ScenePathState,
  type SceneValidation,
  type SceneValidationStatus,
} from './scene/scene-inspector.js';
export {
  SceneFiles,
  verifySceneIntegrity,
  type SceneFileOperations,
  type SceneIntegrityReport,
} from './scene/scene-files.js';
export { Bulkhead, type BulkheadConfig } from './resilience/bulkhead.js';
export * from './services/download-runner.js';
export * from './services/task-executor.js';
export * from './services/worker-pool.js';
export * from './services/progress-tracker.js';
export * from './services/shutdown-controller.js';
export * from './services/wave-orchestrator.js';
export * from './services/wave-orchestrator.types.js';
export { loadConfig, type CLIConfig } from './cli/lib/config.js';
export { CLILogger, createCLILogger, type Logger } from './cli/lib/logger.js';
