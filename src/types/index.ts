// Core type definitions for attribute-level encryption

import type { EncodeFormat } from '../pipeline/codecs.js';

export type { TransformStage } from '../lib/errors.js';
export type { EncodeFormat } from '../pipeline/codecs.js';

export type KeyMaterial = string | Buffer;

/**
 * A value fixed at declaration, the name of a zero-argument method on the
 * owning instance, or a function of the instance.
 */
export type DynamicValue<T, I = object> =
  | { readonly kind: 'literal'; readonly value: T }
  | { readonly kind: 'method'; readonly name: string }
  | { readonly kind: 'callable'; readonly fn: (instance: I) => unknown };

export type KeySource<I = object> = DynamicValue<KeyMaterial, I>;

export type PredicateSource<I = object> = DynamicValue<boolean, I>;

export type MethodRef = { readonly kind: 'method'; readonly name: string };

export interface Marshaler {
  dump(value: unknown): string;
  load(text: string): unknown;
}

/**
 * Parameters handed to a cipher provider entry point. The key sits under the
 * attribute's `secretKeyParamName`, next to every extra option.
 */
export interface CipherParams {
  readonly algorithm: string;
  readonly [param: string]: unknown;
}

export type CipherOutput = Buffer | string;

export type CipherFunction = (value: Buffer, params: CipherParams) => CipherOutput;

/**
 * Any object exposing encrypt/decrypt entry points. The entry point names
 * are chosen per attribute with `encryptMethod` and `decryptMethod`; a
 * `requiresKey: true` property makes declarations without a key fail.
 */
export type CipherProvider = object;

/**
 * Normalized options of one scope (global, class or attribute)
 */
export interface OptionLayer<I = object> {
  readonly key?: KeySource<I>;
  readonly secretKeyParamName?: string;
  readonly storageAttribute?: string;
  readonly prefix?: string;
  readonly suffix?: string;
  readonly ifPredicate?: PredicateSource<I>;
  readonly unlessPredicate?: PredicateSource<I>;
  readonly cipherProvider?: CipherProvider;
  readonly encryptMethod?: string;
  readonly decryptMethod?: string;
  readonly algorithm?: string;
  readonly encode?: boolean | EncodeFormat;
  readonly encodeFormat?: EncodeFormat;
  readonly marshal?: boolean;
  readonly marshaler?: Marshaler;
  readonly allowEmptyValue?: boolean;
  readonly install?: boolean;
  readonly extraOptions?: Readonly<Record<string, unknown>>;
}

export type OptionScope = 'global' | 'class' | 'attribute';

export interface ScopedLayer<I = object> {
  readonly scope: OptionScope;
  readonly options: OptionLayer<I>;
}

export interface AttributeSpec<I = object> {
  readonly name: string;
  readonly storageName: string;
  /** Layers captured at declaration, lowest precedence first */
  readonly layers: readonly ScopedLayer<I>[];
}

export type PredicateOption<I> =
  | boolean
  | MethodRef
  | PredicateSource<I>
  | ((instance: I) => unknown);

/**
 * Options as accepted by `declare` and `setDefaults`. Keys outside this set
 * are forwarded to the cipher provider as extra options.
 */
export interface AttributeOptions<I = object> {
  key?: KeyMaterial | MethodRef | KeySource<I> | ((instance: I) => KeyMaterial);
  secretKeyParamName?: string;
  attribute?: string;
  /** Long form of `attribute` */
  storageAttribute?: string;
  prefix?: string;
  suffix?: string;
  if?: PredicateOption<I>;
  unless?: PredicateOption<I>;
  /** Long forms of `if` and `unless` */
  ifPredicate?: PredicateOption<I>;
  unlessPredicate?: PredicateOption<I>;
  cipherProvider?: CipherProvider;
  encryptMethod?: string;
  decryptMethod?: string;
  algorithm?: string;
  encode?: boolean | EncodeFormat;
  encodeFormat?: EncodeFormat;
  marshal?: boolean;
  marshaler?: Marshaler;
  allowEmptyValue?: boolean;
  install?: boolean;
  extraOptions?: Record<string, unknown>;
  [extraOption: string]: unknown;
}

/**
 * Fully merged and resolved options for a single accessor call
 */
export interface ResolvedOptions {
  readonly attribute: string;
  readonly key: KeyMaterial | undefined;
  readonly secretKeyParamName: string;
  readonly algorithm: string;
  readonly encode: EncodeFormat | false;
  readonly marshal: boolean;
  readonly marshaler: Marshaler;
  readonly allowEmptyValue: boolean;
  readonly cipherProvider: CipherProvider;
  readonly encryptMethod: string;
  readonly decryptMethod: string;
  readonly extraOptions: Readonly<Record<string, unknown>>;
}

/**
 * Reads and writes the storage field behind an encrypted attribute
 */
export interface StorageAccess<I> {
  read(instance: I, storageName: string): unknown;
  write(instance: I, storageName: string, value: unknown): void;
}

export type Constructor<I = object> = abstract new (...args: never[]) => I;
