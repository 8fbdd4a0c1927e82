import { Schema, type Document } from 'mongoose';

import type { AttributeCipher } from '../accessors/attribute-cipher.js';
import type { EncryptedClass } from '../accessors/encrypted-class.js';
import { logger } from '../lib/logger.js';
import type { AttributeOptions, StorageAccess } from '../types/index.js';

export interface EncryptedPluginOptions {
  cipher: AttributeCipher;
  /** Table name, usually the model name */
  name: string;
  attributes: Record<string, AttributeOptions<Document>>;
  /** Class-level defaults for every attribute of the schema */
  defaults?: AttributeOptions<Document>;
}

/**
 * Statics the plugin adds to a model. Pass it as the model type, e.g.
 * `model<IUser, Model<IUser> & EncryptedModelStatics>('User', UserSchema)`.
 */
export interface EncryptedModelStatics {
  encryptedFilter(filter: Record<string, unknown>): Record<string, unknown>;
  encryptedAttributes(): EncryptedClass<Document>;
}

export const documentStorage: StorageAccess<Document> = {
  read(doc, storageName) {
    const value: unknown = doc.get(storageName);
    return value;
  },
  write(doc, storageName, value) {
    doc.set(storageName, value);
  }
};

/**
 * Rewrite a filter on logical attribute names into one on storage names.
 * Only attributes with class-level helpers can be queried this way.
 */
export function encryptedFilter<I extends object>(
  table: EncryptedClass<I>,
  filter: Record<string, unknown>
): Record<string, unknown> {
  const translated: Record<string, unknown> = {};

  for (const [path, value] of Object.entries(filter)) {
    if (table.isEncryptedAttribute(path)) {
      translated[table.storageName(path)] = table.encryptAttr(path, value);
    } else {
      translated[path] = value;
    }
  }

  return translated;
}

/**
 * Mongoose schema plugin. Each encrypted attribute becomes a virtual backed by
 * a Mixed storage path, and the model gains an `encryptedFilter` static.
 *
 * @example
 * UserSchema.plugin(encryptedAttributesPlugin, {
 *   cipher,
 *   name: 'User',
 *   attributes: { email: { key: 'test-secret', encode: true } }
 * });
 * await UserModel.findOne(UserModel.encryptedFilter({ email }));
 */
export function encryptedAttributesPlugin(schema: Schema, options: EncryptedPluginOptions): void {
  const table = options.cipher.define<Document>(options.name, documentStorage);

  if (options.defaults) {
    table.setDefaults(options.defaults);
  }

  for (const [name, attributeOptions] of Object.entries(options.attributes)) {
    table.declare(name, { ...attributeOptions, install: false });
    const storageName = table.storageName(name);

    schema.add({ [storageName]: { type: Schema.Types.Mixed } });
    schema
      .virtual(name)
      .get(function (this: Document): unknown {
        return table.get(this, name);
      })
      .set(function (this: Document, value: unknown) {
        table.set(this, name, value);
      });
  }

  schema.static('encryptedFilter', function (filter: Record<string, unknown>) {
    return encryptedFilter(table, filter);
  });
  schema.static('encryptedAttributes', function () {
    return table;
  });

  logger.debug(
    { model: options.name, attributes: table.declaredAttributes() },
    'Encrypted schema paths added'
  );
}
