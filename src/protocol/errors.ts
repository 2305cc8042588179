/**
 * JID exception hierarchy.
 *
 * All address errors inherit from JIDError. Construction failures are always
 * reported as IllegalJIDError, with the underlying problem chained as `cause`.
 */

import type { ComponentKind } from "./types.js";

/** Base error for all JID errors. */
export class JIDError extends Error {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "JIDError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when a JID cannot be constructed.
 *
 * `literal` is the address that was attempted, assembled from the raw
 * (pre-normalization) parts.
 */
export class IllegalJIDError extends JIDError {
  readonly literal: string;

  constructor(literal: string, options?: { cause?: unknown; reason?: string }) {
    super(
      options?.reason
        ? `Illegal JID: ${literal} (${options.reason})`
        : `Illegal JID: ${literal}`,
      options?.cause !== undefined ? { cause: options.cause } : undefined
    );
    this.name = "IllegalJIDError";
    this.literal = literal;
  }
}

/** Raised when the textual shape of an address is malformed. */
export class InvalidJIDError extends IllegalJIDError {
  constructor(literal: string, reason: string) {
    super(literal, { reason });
    this.name = "InvalidJIDError";
  }
}

/** Raised when a preparation profile rejects its input. */
export class NormalizationError extends JIDError {
  readonly profile: string;
  readonly input: string;

  constructor(profile: string, input: string, reason: string) {
    super(`${profile} rejected ${JSON.stringify(input)}: ${reason}`);
    this.name = "NormalizationError";
    this.profile = profile;
    this.input = input;
  }
}

/** Raised when a normalized component is longer than the protocol allows. */
export class LengthExceededError extends JIDError {
  readonly kind: ComponentKind;
  readonly size: number;
  readonly limit: number;

  constructor(kind: ComponentKind, size: number, limit: number) {
    const label = kind.charAt(0).toUpperCase() + kind.slice(1);
    super(
      `${label} cannot be larger than ${limit} bytes. Size is ${size} bytes.`
    );
    this.name = "LengthExceededError";
    this.kind = kind;
    this.size = size;
    this.limit = limit;
  }
}

/** Raised when the full form is requested from a JID without a resource. */
export class NoResourceError extends JIDError {
  constructor(bareJID: string) {
    super(
      "This JID was instantiated without a resource identifier. " +
        `A full JID representation is not available for: ${bareJID}`
    );
    this.name = "NoResourceError";
  }
}
