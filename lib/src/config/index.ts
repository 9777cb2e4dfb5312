/**
 * Configuration Module
 */

export * from './types.js';

export {
  loadIngestConfig,
  describeConfig,
  maskSecret,
  redactConnectionUrl,
  createLoggerFromConfig,
  type Environment,
} from './loader.js';
