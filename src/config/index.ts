export { ConfigManager } from './manager.js';
export { parseConfig, validateConfig, type ValidationError, type ValidationResult } from './schema.js';
