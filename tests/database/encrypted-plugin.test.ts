import mongoose, { Schema, type Model } from 'mongoose';
import { describe, it, expect, beforeEach } from 'vitest';

import { AttributeCipher } from '../../src/accessors/attribute-cipher.js';
import {
  encryptedAttributesPlugin,
  encryptedFilter,
  type EncryptedModelStatics
} from '../../src/database/encrypted-plugin.js';

interface Customer {
  name: string;
}

type CustomerModel = Model<Customer> & EncryptedModelStatics;

let modelCount = 0;

function customerModel(cipher: AttributeCipher): CustomerModel {
  const schema = new Schema<Customer>({ name: { type: String, required: true } });
  schema.plugin(encryptedAttributesPlugin, {
    cipher,
    name: 'Customer',
    attributes: {
      email: { key: 'test-secret', encode: true },
      notes: { key: 'test-secret', marshal: true, suffix: '_sealed', prefix: '' }
    }
  });

  // Models register on the default connection; no connection is opened
  modelCount += 1;
  return mongoose.model<Customer, CustomerModel>(`EncryptedCustomer${modelCount}`, schema);
}

describe('Encrypted attributes plugin', () => {
  let cipher: AttributeCipher;
  let Customers: CustomerModel;

  beforeEach(() => {
    cipher = new AttributeCipher();
    Customers = customerModel(cipher);
  });

  it('should add a storage path per attribute', () => {
    expect(Customers.schema.path('encrypted_email')).toBeDefined();
    expect(Customers.schema.path('notes_sealed')).toBeDefined();
    expect(Customers.schema.virtualpath('email')).not.toBeNull();
  });

  it('should encrypt through the virtual and read it back', () => {
    const customer = new Customers({ name: 'Ada' });
    customer.set('email', 'ada@example.com');

    const stored: unknown = customer.get('encrypted_email');
    expect(typeof stored).toBe('string');
    expect(stored).not.toBe('ada@example.com');
    expect(customer.get('email')).toBe('ada@example.com');
  });

  it('should marshal structured values', () => {
    const customer = new Customers({ name: 'Ada' });
    customer.set('notes', { tier: 'gold', since: 2020 });

    expect(customer.get('notes')).toEqual({ tier: 'gold', since: 2020 });
  });

  it('should keep stored ciphertext out of the logical field', () => {
    const customer = new Customers({ name: 'Ada' });
    customer.set('email', 'ada@example.com');

    expect(customer.toObject()).not.toHaveProperty('email');
    expect(customer.toObject()).toHaveProperty('encrypted_email');
  });

  it('should translate filters to storage names and ciphertext', () => {
    const customer = new Customers({ name: 'Ada' });
    customer.set('email', 'ada@example.com');

    expect(Customers.encryptedFilter({ email: 'ada@example.com', name: 'Ada' })).toEqual({
      encrypted_email: customer.get('encrypted_email'),
      name: 'Ada'
    });
  });

  it('should expose the attribute table', () => {
    const table = Customers.encryptedAttributes();

    expect(table.declaredAttributes()).toEqual(['email', 'notes']);
    expect(table.storageName('notes')).toBe('notes_sealed');
  });

  it('should translate filters against any table', () => {
    const table = cipher
      .define<{ token?: unknown }>('Session')
      .declare('token', { key: 'test-secret', encode: 'hex' });

    expect(encryptedFilter(table, { token: 'abc', active: true })).toEqual({
      encrypted_token: table.encryptAttr('token', 'abc'),
      active: true
    });
  });
});
