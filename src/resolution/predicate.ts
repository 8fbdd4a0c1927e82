import type { OptionLayer, PredicateSource } from '../types/index.js';
import { resolveDynamic } from './dynamic.js';

export function evaluate<I extends object>(
  instance: I | undefined,
  predicate: PredicateSource<I>,
  option: 'if' | 'unless' = 'if'
): boolean {
  return Boolean(resolveDynamic(predicate, instance, option));
}

/**
 * Gate for the transform pipeline: a missing `if` passes, a missing `unless` does not block.
 * Both predicates are evaluated on every call.
 */
export function isAllowed<I extends object>(instance: I | undefined, options: OptionLayer<I>): boolean {
  const ifResult =
    options.ifPredicate === undefined ? true : evaluate(instance, options.ifPredicate, 'if');
  const unlessResult =
    options.unlessPredicate === undefined
      ? false
      : evaluate(instance, options.unlessPredicate, 'unless');
  return ifResult && !unlessResult;
}
