// Variable registry

export { VariableRegistry } from './registry.js';
