/**
 * The process-wide normalizer used when a JID is built without one.
 *
 * Created from {@link JIDConfig} on first use. Hosting code owns its
 * lifetime: replace it with {@link configureDefaults} or drop it with
 * {@link resetDefaults}.
 */

import {
  defaultNormalizer,
  setDefaultNormalizer,
  setDefaultNormalizerFactory,
} from "../protocol/defaults.js";
import { ComponentNormalizer } from "../protocol/normalizer.js";
import { createPrepCaches } from "../protocol/prep-cache.js";
import { defaultStringprep, type Stringprep } from "../protocol/stringprep.js";
import { JIDConfig } from "./config.js";

export { defaultNormalizer };

setDefaultNormalizerFactory(() => createNormalizer(new JIDConfig()));

/**
 * Build a normalizer with its own caches from a configuration.
 */
export function createNormalizer(
  config: JIDConfig,
  stringprep: Stringprep = defaultStringprep
): ComponentNormalizer {
  return new ComponentNormalizer({
    caches: createPrepCaches({
      node: config.nodeCacheSize,
      domain: config.domainCacheSize,
      resource: config.resourceCacheSize,
    }),
    stringprep,
    lengthMode: config.lengthMode,
  });
}

export function configureDefaults(
  target: ComponentNormalizer | JIDConfig
): ComponentNormalizer {
  const normalizer =
    target instanceof ComponentNormalizer ? target : createNormalizer(target);
  setDefaultNormalizer(normalizer);
  return normalizer;
}

export function resetDefaults(): void {
  setDefaultNormalizer(null);
}
