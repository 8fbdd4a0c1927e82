export { literal, methodRef, callable, hasDynamicShape, isStatic, resolveDynamic } from './dynamic.js';
export { resolve, mergedOptions } from './descriptor-resolver.js';
export { evaluate, isAllowed } from './predicate.js';
