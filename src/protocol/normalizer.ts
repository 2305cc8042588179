/**
 * Component normalizer: runs each JID part through its stringprep profile,
 * enforces the per-component size limit and maintains the prep caches.
 */

import { LengthExceededError, NormalizationError } from "./errors.js";
import { createPrepCaches, type PrepCaches } from "./prep-cache.js";
import { defaultStringprep, type Stringprep } from "./stringprep.js";
import {
  MAX_COMPONENT_BYTES,
  encodedSize,
  type ComponentKind,
  type LengthMode,
} from "./types.js";

export interface ComponentNormalizerOptions {
  caches?: PrepCaches;
  stringprep?: Stringprep;
  lengthMode?: LengthMode;
}

export class ComponentNormalizer {
  readonly caches: PrepCaches;
  readonly stringprep: Stringprep;
  readonly lengthMode: LengthMode;

  constructor(options: ComponentNormalizerOptions = {}) {
    this.caches = options.caches ?? createPrepCaches();
    this.stringprep = options.stringprep ?? defaultStringprep;
    this.lengthMode = options.lengthMode ?? "utf8";
  }

  /**
   * Prepare one component.
   *
   * An empty node or resource is treated as absent. A raw value that is
   * already in the kind's cache is known to be prepared and is returned
   * as-is, without running the profile.
   *
   * @throws {NormalizationError} If the profile rejects the value, or the
   *   domain is null.
   * @throws {LengthExceededError} If the prepared value is too long.
   */
  normalize(kind: "domain", raw: string): string;
  normalize(kind: ComponentKind, raw: string | null): string | null;
  normalize(kind: ComponentKind, raw: string | null): string | null {
    if (kind === "domain" && raw === null) {
      throw new NormalizationError("nameprep", "", "domain cannot be null");
    }
    if (kind !== "domain" && raw === "") {
      raw = null;
    }
    const cache = this.caches[kind];
    if (raw === null || cache.contains(raw)) {
      return raw;
    }

    const prepared = this._prepare(kind, raw);
    const size = encodedSize(prepared, this.lengthMode);
    if (size > MAX_COMPONENT_BYTES) {
      throw new LengthExceededError(kind, size, MAX_COMPONENT_BYTES);
    }
    cache.put(prepared);
    return prepared;
  }

  nodeprep(node: string | null): string | null {
    return this.normalize("node", node);
  }

  domainprep(domain: string): string {
    return this.normalize("domain", domain);
  }

  resourceprep(resource: string | null): string | null {
    return this.normalize("resource", resource);
  }

  private _prepare(kind: ComponentKind, raw: string): string {
    switch (kind) {
      case "node":
        return this.stringprep.nodeprep(raw);
      case "resource":
        return this.stringprep.resourceprep(raw);
      case "domain": {
        // Every uncached domain goes through IDNA, ASCII or not.
        const domain = this.stringprep.nameprep(this.stringprep.toASCII(raw));
        if (domain === "") {
          throw new NormalizationError("nameprep", raw, "empty domain");
        }
        return domain;
      }
    }
  }
}
