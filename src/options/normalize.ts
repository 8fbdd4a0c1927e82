import { DeclarationError } from '../lib/errors.js';
import {
  StaticOptionsSchema,
  describeIssues,
  dynamicOptionKeys,
  staticOptionKeys
} from '../lib/validation.js';
import { callable, hasDynamicShape, literal } from '../resolution/dynamic.js';
import type {
  AttributeOptions,
  KeySource,
  OptionLayer,
  PredicateOption,
  PredicateSource
} from '../types/index.js';

const reservedKeys = new Set<string>([...staticOptionKeys, ...dynamicOptionKeys]);

function normalizeKey<I>(
  key: AttributeOptions<I>['key'],
  attribute: string | undefined
): KeySource<I> | undefined {
  if (key === undefined) {
    return undefined;
  }
  if (typeof key === 'string' || Buffer.isBuffer(key)) {
    return literal(key);
  }
  if (typeof key === 'function') {
    return callable(key);
  }
  if (hasDynamicShape(key)) {
    return key;
  }
  throw new DeclarationError(
    'key must be a string, a Buffer, a method ref or a function',
    attribute
  );
}

/**
 * Read an option given under its short name or its long alias, not both
 */
function aliased<T>(
  short: T | undefined,
  long: T | undefined,
  names: readonly [string, string],
  attribute: string | undefined
): T | undefined {
  if (short !== undefined && long !== undefined) {
    throw new DeclarationError(
      `${names[0]} and ${names[1]} are the same option; give only one`,
      attribute
    );
  }
  return short ?? long;
}

function normalizePredicate<I>(
  predicate: PredicateOption<I> | undefined,
  option: 'if' | 'unless',
  attribute: string | undefined
): PredicateSource<I> | undefined {
  if (predicate === undefined) {
    return undefined;
  }
  if (typeof predicate === 'boolean') {
    return literal(predicate);
  }
  if (typeof predicate === 'function') {
    return callable(predicate);
  }
  if (hasDynamicShape(predicate)) {
    return predicate;
  }
  throw new DeclarationError(
    `${option} must be a boolean, a method ref or a function`,
    attribute
  );
}

/**
 * Turn declaration options into an option layer. Known keys are validated;
 * anything else is kept as an extra option for the cipher provider.
 */
export function normalizeOptions<I>(
  options: AttributeOptions<I>,
  attribute?: string
): OptionLayer<I> {
  const picked: Record<string, unknown> = {};
  const loose: Record<string, unknown> = {};

  for (const [name, value] of Object.entries(options)) {
    if (value === undefined || dynamicOptionKeys.some(key => key === name)) {
      continue;
    }
    if (reservedKeys.has(name)) {
      picked[name] = value;
    } else {
      loose[name] = value;
    }
  }

  const parsed = StaticOptionsSchema.safeParse(picked);
  if (!parsed.success) {
    throw new DeclarationError(
      `Invalid options${attribute ? ` for ${attribute}` : ''}: ${describeIssues(parsed.error)}`,
      attribute
    );
  }

  const { attribute: short, storageAttribute: long, extraOptions, ...rest } = parsed.data;
  const storageAttribute = aliased(short, long, ['attribute', 'storageAttribute'], attribute);
  const extras = { ...loose, ...extraOptions };

  const layer: OptionLayer<I> = {
    ...rest,
    ...(storageAttribute !== undefined && { storageAttribute }),
    ...(Object.keys(extras).length > 0 && { extraOptions: extras })
  };

  const key = normalizeKey(options.key, attribute);
  const ifPredicate = normalizePredicate(
    aliased(options.if, options.ifPredicate, ['if', 'ifPredicate'], attribute),
    'if',
    attribute
  );
  const unlessPredicate = normalizePredicate(
    aliased(options.unless, options.unlessPredicate, ['unless', 'unlessPredicate'], attribute),
    'unless',
    attribute
  );

  return Object.freeze({
    ...layer,
    ...(key && { key }),
    ...(ifPredicate && { ifPredicate }),
    ...(unlessPredicate && { unlessPredicate })
  });
}

/**
 * Merge layers given lowest precedence first. Extra options merge key by key.
 */
export function mergeLayers<I>(layers: readonly OptionLayer<I>[]): OptionLayer<I> {
  let merged: OptionLayer<I> = {};

  for (const layer of layers) {
    merged = {
      ...merged,
      ...layer,
      extraOptions: { ...merged.extraOptions, ...layer.extraOptions }
    };
  }

  return merged;
}
