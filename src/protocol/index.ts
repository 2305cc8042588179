/**
 * JID protocol layer: the address value type and its building blocks.
 *
 * Public API re-exports for the protocol layer.
 */

// Types
export {
  type ComponentKind,
  type JIDParts,
  type LengthMode,
  COMPONENT_KINDS,
  LENGTH_MODES,
  MAX_COMPONENT_BYTES,
  encodedSize,
} from "./types.js";

// Errors
export {
  JIDError,
  IllegalJIDError,
  InvalidJIDError,
  NormalizationError,
  LengthExceededError,
  NoResourceError,
} from "./errors.js";

// Escaping
export { NODE_ESCAPES, escapeNode, unescapeNode } from "./escape.js";

// Parsing
export { parseJIDParts } from "./parser.js";

// Stringprep
export { type Stringprep, defaultStringprep } from "./stringprep.js";

// Caches
export {
  PrepCache,
  type PrepCacheCapacities,
  type PrepCaches,
  DEFAULT_CACHE_CAPACITIES,
  createPrepCaches,
} from "./prep-cache.js";

// Normalizer
export {
  ComponentNormalizer,
  type ComponentNormalizerOptions,
} from "./normalizer.js";

// JID
export { JID, type JIDInit, type JIDOptions } from "./jid.js";
