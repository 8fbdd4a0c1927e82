import { ResolutionError } from '../lib/errors.js';
import type { DynamicValue, MethodRef } from '../types/index.js';

export function literal<T>(value: T): { readonly kind: 'literal'; readonly value: T } {
  return { kind: 'literal', value };
}

/**
 * Refer to a zero-argument method of the owning instance, called on every resolution
 */
export function methodRef(name: string): MethodRef {
  return { kind: 'method', name };
}

export function callable<I>(
  fn: (instance: I) => unknown
): { readonly kind: 'callable'; readonly fn: (instance: I) => unknown } {
  return { kind: 'callable', fn };
}

/**
 * Runtime shape check for values passed in as already-tagged variants
 */
export function hasDynamicShape(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || Buffer.isBuffer(value)) {
    return false;
  }

  const kind: unknown = Reflect.get(value, 'kind');
  switch (kind) {
    case 'literal':
      return 'value' in value;
    case 'method':
      return typeof Reflect.get(value, 'name') === 'string';
    case 'callable':
      return typeof Reflect.get(value, 'fn') === 'function';
    default:
      return false;
  }
}

/**
 * True when the value is known at declaration time
 */
export function isStatic<T, I>(source: DynamicValue<T, I> | undefined): boolean {
  return source === undefined || source.kind === 'literal';
}

/**
 * Resolve a dynamic value against an instance. Nothing is memoized.
 */
export function resolveDynamic<T, I extends object>(
  source: DynamicValue<T, I>,
  instance: I | undefined,
  option: string
): unknown {
  switch (source.kind) {
    case 'literal':
      return source.value;

    case 'method': {
      if (instance === undefined) {
        throw new ResolutionError(
          `${option} refers to method ${source.name} but no instance is available`,
          option
        );
      }

      const method: unknown = Reflect.get(instance, source.name);
      if (typeof method !== 'function') {
        throw new ResolutionError(
          `${option} refers to method ${source.name}, which the instance does not expose`,
          option
        );
      }

      const value: unknown = method.call(instance);
      return value;
    }

    case 'callable':
      if (instance === undefined) {
        throw new ResolutionError(`${option} is a function but no instance is available`, option);
      }
      return source.fn(instance);
  }
}
