import { DeclarationError } from '../lib/errors.js';
import { DefaultLayer } from '../options/registry.js';
import type { AttributeOptions, Constructor, StorageAccess } from '../types/index.js';
import { EncryptedClass } from './encrypted-class.js';

export interface ForClassOptions<I extends object> {
  storage?: StorageAccess<I>;
  /** Class defaults applied before any declaration */
  defaults?: AttributeOptions<I>;
}

/**
 * Entry point for declaring encrypted attributes. Owns the global option
 * layer; each class gets its own EncryptedClass table with a class layer.
 *
 * Encrypted attributes must be `declare`d in the class body, not written as
 * fields: a field becomes an own property of each instance and hides the
 * accessor installed on the prototype.
 *
 * @example
 * class User {
 *   declare ssn: string;
 * }
 * const cipher = new AttributeCipher({ encode: true });
 * const users = cipher.forClass(User).declare('ssn', { key: 'test-secret' });
 * user.ssn = '123-45-6789'; // user.encrypted_ssn holds base64 ciphertext
 */
export class AttributeCipher {
  readonly defaults: DefaultLayer;
  private readonly registered = new WeakSet<object>();

  constructor(defaults: AttributeOptions = {}) {
    this.defaults = new DefaultLayer();
    if (Object.keys(defaults).length > 0) {
      this.defaults.merge(defaults);
    }
  }

  /**
   * Merge options into the global layer. Declarations made earlier keep the
   * defaults they were declared with.
   */
  setDefaults(options: AttributeOptions): this {
    this.defaults.merge(options);
    return this;
  }

  /**
   * Create the encrypted attribute table of a class. A class can be
   * registered once per AttributeCipher; keep the returned table.
   */
  forClass<I extends object>(
    target: Constructor<I>,
    options: ForClassOptions<I> = {}
  ): EncryptedClass<I> {
    if (this.registered.has(target)) {
      throw new DeclarationError(`${target.name} already has an encrypted attribute table`);
    }

    const prototype: unknown = target.prototype;
    const table = new EncryptedClass<I>({
      name: target.name,
      defaults: this.defaults,
      storage: options.storage,
      prototype: typeof prototype === 'object' && prototype !== null ? prototype : undefined
    });

    if (options.defaults) {
      table.setDefaults(options.defaults);
    }

    this.registered.add(target);
    return table;
  }

  /**
   * Create a table that is not tied to a class, e.g. for a persistence schema
   */
  define<I extends object>(name: string, storage?: StorageAccess<I>): EncryptedClass<I> {
    return new EncryptedClass<I>({ name, defaults: this.defaults, storage });
  }
}
