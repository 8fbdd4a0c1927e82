import { env } from '../config/index.js';
import { defaultCipherProvider } from '../crypto/node-cipher.js';
import { assertEntryPoints, requiresKey } from '../crypto/provider.js';
import { DeclarationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { AttributeNameSchema } from '../lib/validation.js';
import { jsonMarshaler } from '../pipeline/codecs.js';
import type {
  AttributeOptions,
  AttributeSpec,
  OptionLayer,
  ScopedLayer
} from '../types/index.js';
import { mergeLayers, normalizeOptions } from './normalize.js';

/**
 * Library defaults, seeded from the environment
 */
export function builtinDefaults(): OptionLayer {
  return Object.freeze({
    secretKeyParamName: 'key',
    prefix: env.ATTR_CIPHER_STORAGE_PREFIX,
    suffix: env.ATTR_CIPHER_STORAGE_SUFFIX,
    cipherProvider: defaultCipherProvider,
    encryptMethod: 'encrypt',
    decryptMethod: 'decrypt',
    algorithm: env.ATTR_CIPHER_ALGORITHM,
    encode: false,
    encodeFormat: env.ATTR_CIPHER_ENCODE_FORMAT,
    marshal: false,
    marshaler: jsonMarshaler,
    allowEmptyValue: false,
    install: true
  });
}

/**
 * The global option layer. Each change replaces the layer object, so specs
 * declared earlier keep the layer they captured.
 */
export class DefaultLayer {
  private current: OptionLayer;

  constructor(initial: OptionLayer = builtinDefaults()) {
    this.current = initial;
  }

  get layer(): OptionLayer {
    return this.current;
  }

  merge(options: AttributeOptions): void {
    this.current = Object.freeze(mergeLayers([this.current, normalizeOptions(options)]));
    logger.debug({ scope: 'global', options: Object.keys(options) }, 'Default options changed');
  }
}

/**
 * Option layers and attribute specs of one class
 */
export class OptionRegistry<I extends object> {
  private classLayer: OptionLayer<I> = Object.freeze({});
  private readonly specs = new Map<string, AttributeSpec<I>>();

  constructor(
    readonly className: string,
    private readonly defaults: DefaultLayer
  ) {}

  /**
   * Merge options into the global or class layer. Affects later declarations only.
   */
  setDefault(...args: ['global', AttributeOptions] | ['class', AttributeOptions<I>]): void {
    if (args[0] === 'global') {
      this.defaults.merge(args[1]);
      return;
    }

    const options = args[1];
    this.classLayer = Object.freeze(mergeLayers([this.classLayer, normalizeOptions(options)]));
    logger.debug(
      { scope: 'class', className: this.className, options: Object.keys(options) },
      'Default options changed'
    );
  }

  declareAttribute(name: string, options: AttributeOptions<I> = {}): AttributeSpec<I> {
    const [spec] = this.prepareAttributes([name], options);
    if (!spec) {
      throw new DeclarationError(`No attribute names given for ${this.className}`);
    }
    this.commit([spec]);
    return spec;
  }

  /**
   * Build and check the specs of several attributes without registering any.
   * Collisions are checked against declared attributes and within the batch.
   */
  prepareAttributes(
    names: readonly string[],
    options: AttributeOptions<I> = {}
  ): AttributeSpec<I>[] {
    const prepared: AttributeSpec<I>[] = [];

    for (const name of names) {
      if (!AttributeNameSchema.safeParse(name).success) {
        throw new DeclarationError(`Invalid attribute name: ${JSON.stringify(name)}`, name);
      }

      const layers: ScopedLayer<I>[] = [
        { scope: 'global', options: this.defaults.layer },
        { scope: 'class', options: this.classLayer },
        { scope: 'attribute', options: normalizeOptions(options, name) }
      ];
      const merged = mergeLayers(layers.map(layer => layer.options));

      const storageName =
        merged.storageAttribute ?? `${merged.prefix ?? ''}${name}${merged.suffix ?? ''}`;
      this.assertNoCollision(name, storageName, prepared);

      const provider = merged.cipherProvider ?? defaultCipherProvider;
      assertEntryPoints(
        provider,
        merged.encryptMethod ?? 'encrypt',
        merged.decryptMethod ?? 'decrypt',
        name
      );
      if (requiresKey(provider) && merged.key === undefined) {
        throw new DeclarationError(`No key configured for ${name}`, name);
      }

      prepared.push(Object.freeze({ name, storageName, layers: Object.freeze(layers) }));
    }

    return prepared;
  }

  /**
   * Register specs built by `prepareAttributes`
   */
  commit(specs: readonly AttributeSpec<I>[]): void {
    for (const spec of specs) {
      this.specs.set(spec.name, spec);
      logger.debug(
        { className: this.className, attribute: spec.name, storageName: spec.storageName },
        'Attribute declared'
      );
    }
  }

  /**
   * Layers of a declared attribute, lowest precedence first
   */
  effectiveLayers(name: string): readonly OptionLayer<I>[] {
    return this.spec(name).layers.map(layer => layer.options);
  }

  spec(name: string): AttributeSpec<I> {
    const spec = this.specs.get(name);
    if (!spec) {
      throw new DeclarationError(`${name} is not an encrypted attribute of ${this.className}`, name);
    }
    return spec;
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  attributes(): readonly AttributeSpec<I>[] {
    return [...this.specs.values()];
  }

  private assertNoCollision(
    name: string,
    storageName: string,
    pending: readonly AttributeSpec<I>[]
  ): void {
    if (storageName === name) {
      throw new DeclarationError(`Storage attribute of ${name} cannot share its name`, name);
    }

    for (const spec of [...this.specs.values(), ...pending]) {
      // Re-declaring an attribute replaces its spec
      if (spec.name === name) {
        continue;
      }
      if (spec.storageName === storageName) {
        throw new DeclarationError(
          `${name} and ${spec.name} both store into ${storageName}`,
          name
        );
      }
      if (spec.name === storageName || spec.storageName === name) {
        throw new DeclarationError(
          `Storage attribute ${storageName} of ${name} clashes with ${spec.name}`,
          name
        );
      }
    }
  }
}
