/**
 * Library configuration.
 *
 * Priority (highest wins): constructor arg > env var > default.
 */

import { DEFAULT_CACHE_CAPACITIES } from "../protocol/prep-cache.js";
import { LENGTH_MODES, type LengthMode } from "../protocol/types.js";

export class JIDConfig {
  readonly nodeCacheSize: number;
  readonly domainCacheSize: number;
  readonly resourceCacheSize: number;
  readonly lengthMode: LengthMode;

  constructor(
    options: {
      nodeCacheSize?: number | null;
      domainCacheSize?: number | null;
      resourceCacheSize?: number | null;
      lengthMode?: string | null;
    } = {}
  ) {
    this.nodeCacheSize = cacheSize(
      "nodeCacheSize",
      options.nodeCacheSize ?? envInt("JID_NODE_CACHE_SIZE"),
      DEFAULT_CACHE_CAPACITIES.node
    );
    this.domainCacheSize = cacheSize(
      "domainCacheSize",
      options.domainCacheSize ?? envInt("JID_DOMAIN_CACHE_SIZE"),
      DEFAULT_CACHE_CAPACITIES.domain
    );
    this.resourceCacheSize = cacheSize(
      "resourceCacheSize",
      options.resourceCacheSize ?? envInt("JID_RESOURCE_CACHE_SIZE"),
      DEFAULT_CACHE_CAPACITIES.resource
    );

    const mode = options.lengthMode ?? process.env["JID_LENGTH_MODE"] ?? "utf8";
    if (!isLengthMode(mode)) {
      throw new Error(
        `Invalid lengthMode '${mode}'. ` +
          `Must be one of: ${JSON.stringify([...LENGTH_MODES])}`
      );
    }
    this.lengthMode = mode;
  }
}

function isLengthMode(value: string): value is LengthMode {
  return (LENGTH_MODES as readonly string[]).includes(value);
}

function envInt(key: string): number | null {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return null;
  }
  return Number(raw);
}

function cacheSize(
  name: string,
  value: number | null,
  fallback: number
): number {
  if (value === null) {
    return fallback;
  }
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`Invalid ${name} '${value}'. Must be a positive integer`);
  }
  return value;
}
