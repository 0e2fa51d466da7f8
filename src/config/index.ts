/**
 * Configuration Exports
 */

export {
  DEFAULT_MODEL_CATALOG,
  parseModelCatalog,
  loadModelCatalog,
  getModelChain,
} from './models.js';
