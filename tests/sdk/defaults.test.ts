/**
 * Tests for the process-wide normalizer.
 */

import { describe, it, expect, afterEach } from "vitest";
import { JIDConfig } from "../../src/sdk/config.js";
import {
  configureDefaults,
  createNormalizer,
  defaultNormalizer,
  resetDefaults,
} from "../../src/sdk/defaults.js";
import { ComponentNormalizer } from "../../src/protocol/normalizer.js";
import { createPrepCaches } from "../../src/protocol/prep-cache.js";
import { JID } from "../../src/protocol/jid.js";
import { defaultNormalizer as protocolDefault } from "../../src/protocol/defaults.js";

afterEach(() => {
  resetDefaults();
  delete process.env["JID_DOMAIN_CACHE_SIZE"];
});

describe("defaultNormalizer", () => {
  it("is created once and reused", () => {
    expect(defaultNormalizer()).toBe(defaultNormalizer());
  });

  it("is rebuilt after a reset", () => {
    const first = defaultNormalizer();
    resetDefaults();
    expect(defaultNormalizer()).not.toBe(first);
  });

  it("is built from the environment", () => {
    process.env["JID_DOMAIN_CACHE_SIZE"] = "3";
    resetDefaults();
    expect(defaultNormalizer().caches.domain.capacity).toBe(3);
  });

  it("backs JIDs built without a normalizer", () => {
    new JID("user@example.com");
    expect(defaultNormalizer().caches.node.contains("user")).toBe(true);
  });
});

describe("configureDefaults", () => {
  it("accepts a configuration", () => {
    const n = configureDefaults(new JIDConfig({ lengthMode: "utf16" }));
    expect(defaultNormalizer()).toBe(n);
    expect(n.lengthMode).toBe("utf16");
    expect(() => JID.of(null, "example.com", "a".repeat(512))).toThrow();
  });

  it("accepts a normalizer", () => {
    const n = new ComponentNormalizer({ caches: createPrepCaches({ node: 1 }) });
    configureDefaults(n);
    expect(defaultNormalizer()).toBe(n);
  });
});

describe("createNormalizer", () => {
  it("sizes the caches from the configuration", () => {
    const n = createNormalizer(
      new JIDConfig({ nodeCacheSize: 2, domainCacheSize: 3, resourceCacheSize: 4 })
    );
    expect(n.caches.node.capacity).toBe(2);
    expect(n.caches.domain.capacity).toBe(3);
    expect(n.caches.resource.capacity).toBe(4);
    expect(n.lengthMode).toBe("utf8");
  });
});

describe("protocol wiring", () => {
  it("installs the configuration-driven factory for JIDs", () => {
    process.env["JID_DOMAIN_CACHE_SIZE"] = "7";
    resetDefaults();
    expect(protocolDefault().caches.domain.capacity).toBe(7);
    expect(protocolDefault()).toBe(defaultNormalizer());
  });
});
