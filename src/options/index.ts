export { OptionRegistry, DefaultLayer, builtinDefaults } from './registry.js';
export { normalizeOptions, mergeLayers } from './normalize.js';
