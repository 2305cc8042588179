/**
 * Holder for the process-wide normalizer used when a JID is built without
 * one. The factory that creates it on first use can be replaced, so hosting
 * code decides how it is configured.
 */

import { ComponentNormalizer } from "./normalizer.js";

let factory: () => ComponentNormalizer = () => new ComponentNormalizer();
let current: ComponentNormalizer | null = null;

export function defaultNormalizer(): ComponentNormalizer {
  if (current === null) {
    current = factory();
  }
  return current;
}

/** Replace the normalizer; `null` makes the next lookup use the factory. */
export function setDefaultNormalizer(normalizer: ComponentNormalizer | null): void {
  current = normalizer;
}

/** Replace the factory and drop the current normalizer. */
export function setDefaultNormalizerFactory(
  create: () => ComponentNormalizer
): void {
  factory = create;
  current = null;
}
