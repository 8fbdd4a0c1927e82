/**
 * Error taxonomy for attribute declaration, option resolution and the
 * transform pipeline. Cipher provider errors are never wrapped in these.
 */

export type TransformStage = 'marshal' | 'encrypt' | 'encode' | 'decode' | 'decrypt' | 'unmarshal';

export abstract class AttributeCipherError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised while declaring attributes or changing defaults
 */
export class DeclarationError extends AttributeCipherError {
  readonly code = 'ATTR_DECLARATION';
  readonly attribute?: string;

  constructor(message: string, attribute?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.attribute = attribute;
  }
}

/**
 * Raised when a method ref or callable cannot produce a usable value for an instance
 */
export class ResolutionError extends AttributeCipherError {
  readonly code = 'ATTR_RESOLUTION';
  readonly option: string;

  constructor(message: string, option: string, options?: { cause?: unknown }) {
    super(message, options);
    this.option = option;
  }
}

export class TransformError extends AttributeCipherError {
  readonly code = 'ATTR_TRANSFORM';
  readonly stage: TransformStage;
  readonly attribute?: string;

  constructor(
    stage: TransformStage,
    message: string,
    attribute?: string,
    options?: { cause?: unknown }
  ) {
    super(`${stage} failed${attribute ? ` for ${attribute}` : ''}: ${message}`, options);
    this.stage = stage;
    this.attribute = attribute;
  }
}
