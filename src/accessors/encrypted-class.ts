import { DeclarationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { OptionRegistry, type DefaultLayer } from '../options/registry.js';
import { decryptValue, encryptValue } from '../pipeline/transform-pipeline.js';
import { mergedOptions, resolve } from '../resolution/descriptor-resolver.js';
import { isStatic } from '../resolution/dynamic.js';
import { isAllowed } from '../resolution/predicate.js';
import type {
  AttributeOptions,
  AttributeSpec,
  OptionLayer,
  StorageAccess
} from '../types/index.js';

/**
 * Getter/setter pair bound to one declared attribute
 */
export interface AttributeAccessor<I> {
  get(instance: I): unknown;
  /** Returns the logical value passed in, not the stored form */
  set(instance: I, value: unknown): unknown;
}

/**
 * Class-level transforms for attributes whose key and predicates are fixed at
 * declaration. Output matches what the instance setter stores.
 */
export interface AttributeHelpers {
  encryptAttr(value: unknown): unknown;
  decryptAttr(value: unknown): unknown;
}

export const propertyStorage: StorageAccess<object> = {
  read(instance, storageName) {
    const value: unknown = Reflect.get(instance, storageName);
    return value;
  },
  write(instance, storageName, value) {
    Reflect.set(instance, storageName, value);
  }
};

export interface EncryptedClassOptions<I extends object> {
  name: string;
  defaults: DefaultLayer;
  storage?: StorageAccess<I>;
  /** Prototype receiving property accessors for attributes declared with `install` */
  prototype?: object;
}

function isHelperEligible<I>(options: OptionLayer<I>): boolean {
  return (
    isStatic(options.key) && isStatic(options.ifPredicate) && isStatic(options.unlessPredicate)
  );
}

/**
 * Per-class table of encrypted attributes: the accessor pairs, the class
 * helpers and the logical-to-storage name mapping
 */
export class EncryptedClass<I extends object> {
  readonly name: string;
  private readonly registry: OptionRegistry<I>;
  private readonly storage: StorageAccess<I>;
  private readonly prototype?: object;
  private readonly accessors = new Map<string, AttributeAccessor<I>>();
  private readonly helperTable = new Map<string, AttributeHelpers>();
  private readonly installed = new Set<string>();

  constructor(options: EncryptedClassOptions<I>) {
    this.name = options.name;
    this.registry = new OptionRegistry<I>(options.name, options.defaults);
    this.storage = options.storage ?? propertyStorage;
    this.prototype = options.prototype;
  }

  /**
   * Merge options into this class's defaults. Only later declarations see them.
   */
  setDefaults(options: AttributeOptions<I>): this {
    this.registry.setDefault('class', options);
    return this;
  }

  /**
   * Declare one or more attributes with the same options. Either every name
   * is declared or, when one fails its checks, none is.
   *
   * Installed accessors live on the prototype, so the class must not define
   * the attribute as a field: use `declare ssn: string`, not `ssn?: string`.
   */
  declare(names: string | readonly string[], options: AttributeOptions<I> = {}): this {
    const list = typeof names === 'string' ? [names] : names;

    if (list.length === 0) {
      throw new DeclarationError(`No attribute names given for ${this.name}`);
    }

    const specs = this.registry.prepareAttributes(list, options);
    const prototype = this.prototype;
    const declared = specs.map(spec => {
      const merged = mergedOptions(spec);
      const install = merged.install === true;
      if (install && prototype) {
        this.assertRedefinable(prototype, spec.name);
      }
      return { spec, merged, install };
    });

    this.registry.commit(specs);

    for (const { spec, merged, install } of declared) {
      const name = spec.name;
      this.accessors.set(name, this.bind(spec));
      this.helperTable.delete(name);

      if (isHelperEligible(merged)) {
        this.helperTable.set(name, this.synthesizeHelpers(spec, merged));
        logger.debug({ className: this.name, attribute: name }, 'Class helpers synthesized');
      }

      if (install && prototype) {
        this.install(prototype, name);
      } else {
        this.installed.delete(name);
      }
    }

    return this;
  }

  /**
   * Throw when an instance carries its own data property for an installed
   * attribute. Such a property hides the prototype accessor, so writes to it
   * would keep plaintext. Returns the instance.
   */
  checkInstance<T extends I>(instance: T): T {
    for (const name of this.installed) {
      this.assertNotShadowed(instance, name);
    }
    return instance;
  }

  get(instance: I, name: string): unknown {
    return this.accessor(name).get(instance);
  }

  set(instance: I, name: string, value: unknown): unknown {
    return this.accessor(name).set(instance, value);
  }

  accessor(name: string): AttributeAccessor<I> {
    const accessor = this.accessors.get(name);
    if (!accessor) {
      throw new DeclarationError(`${name} is not an encrypted attribute of ${this.name}`, name);
    }
    return accessor;
  }

  /**
   * Run the write path for an instance without touching its storage field
   */
  encryptFor(instance: I, name: string, value: unknown): unknown {
    const spec = this.registry.spec(name);
    const merged = mergedOptions(spec);
    const options = resolve(instance, spec, merged);
    return isAllowed(instance, merged) ? encryptValue(value, options) : value;
  }

  decryptFor(instance: I, name: string, value: unknown): unknown {
    const spec = this.registry.spec(name);
    const merged = mergedOptions(spec);
    const options = resolve(instance, spec, merged);
    return isAllowed(instance, merged) ? decryptValue(value, options) : value;
  }

  helpers(name: string): AttributeHelpers | undefined {
    return this.helperTable.get(name);
  }

  encryptAttr(name: string, value: unknown): unknown {
    return this.requireHelpers(name).encryptAttr(value);
  }

  decryptAttr(name: string, value: unknown): unknown {
    return this.requireHelpers(name).decryptAttr(value);
  }

  isEncryptedAttribute(name: string): boolean {
    return this.registry.has(name);
  }

  declaredAttributes(): string[] {
    return this.registry.attributes().map(spec => spec.name);
  }

  /**
   * Logical attribute name to storage attribute name
   */
  storageMapping(): ReadonlyMap<string, string> {
    return new Map(this.registry.attributes().map(spec => [spec.name, spec.storageName]));
  }

  storageName(name: string): string {
    return this.registry.spec(name).storageName;
  }

  effectiveLayers(name: string): readonly OptionLayer<I>[] {
    return this.registry.effectiveLayers(name);
  }

  private requireHelpers(name: string): AttributeHelpers {
    const helpers = this.helperTable.get(name);
    if (!helpers) {
      throw new DeclarationError(
        this.registry.has(name)
          ? `${name} depends on instance state and has no class-level helpers`
          : `${name} is not an encrypted attribute of ${this.name}`,
        name
      );
    }
    return helpers;
  }

  private bind(spec: AttributeSpec<I>): AttributeAccessor<I> {
    const storage = this.storage;
    const guard = (instance: I): void => {
      if (this.installed.has(spec.name)) {
        this.assertNotShadowed(instance, spec.name);
      }
    };

    return {
      get(instance) {
        guard(instance);
        const stored = storage.read(instance, spec.storageName);
        const merged = mergedOptions(spec);
        const options = resolve(instance, spec, merged);
        return isAllowed(instance, merged) ? decryptValue(stored, options) : stored;
      },
      set(instance, value) {
        guard(instance);
        const merged = mergedOptions(spec);
        const options = resolve(instance, spec, merged);
        const stored = isAllowed(instance, merged) ? encryptValue(value, options) : value;
        storage.write(instance, spec.storageName, stored);
        return value;
      }
    };
  }

  private synthesizeHelpers(spec: AttributeSpec<I>, merged: OptionLayer<I>): AttributeHelpers {
    const options = resolve(undefined, spec, merged);
    const allowed = isAllowed(undefined, merged);

    return {
      encryptAttr: value => (allowed ? encryptValue(value, options) : value),
      decryptAttr: value => (allowed ? decryptValue(value, options) : value)
    };
  }

  private assertRedefinable(prototype: object, name: string): void {
    const existing = Object.getOwnPropertyDescriptor(prototype, name);
    if (existing && !existing.configurable) {
      throw new DeclarationError(`${this.name}.${name} cannot be redefined`, name);
    }
  }

  private assertNotShadowed(instance: I, name: string): void {
    const own = Object.getOwnPropertyDescriptor(instance, name);
    if (own && 'value' in own) {
      throw new DeclarationError(
        `${this.name}.${name} is an own field of the instance and hides the encrypted accessor; ` +
          'declare it with `declare` instead of initializing it as a class field',
        name
      );
    }
  }

  /**
   * Define the accessor pair on the prototype. Class fields of the same name
   * shadow it, which `checkInstance` and the table accessors detect.
   */
  private install(prototype: object, name: string): void {
    const accessor = this.accessor(name);
    Object.defineProperty(prototype, name, {
      configurable: true,
      enumerable: false,
      get(this: I): unknown {
        return accessor.get(this);
      },
      set(this: I, value: unknown) {
        accessor.set(this, value);
      }
    });
    this.installed.add(name);
  }
}
