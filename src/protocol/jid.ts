/**
 * The JID value type.
 *
 * A JID is made up of a node (generally a username), a domain and a
 * resource. The node and resource are optional; the domain is required:
 *
 *     jid = [ node "@" ] domain [ "/" resource ]
 *
 * e.g. `user@example.com`, `user@example.com/home`, `example.com`.
 *
 * Each part is prepared with its stringprep profile on construction, so two
 * JIDs that differ only in node or domain case are equal. Each part must fit
 * in 1023 bytes, for a maximum of 3071 bytes including the separators.
 */

import { defaultNormalizer } from "./defaults.js";
import { escapeNode, unescapeNode } from "./escape.js";
import { IllegalJIDError, NoResourceError } from "./errors.js";
import type { ComponentNormalizer } from "./normalizer.js";
import { parseJIDParts } from "./parser.js";
import type { JIDParts } from "./types.js";

export interface JIDOptions {
  /**
   * Take the parts verbatim: no stringprep, no size checks, no cache
   * updates. Only for parts that are known to be prepared already.
   */
  skipStringprep?: boolean;
  /** Normalizer to prepare the parts with; defaults to the process-wide one. */
  normalizer?: ComponentNormalizer;
}

/** Parts for building a JID from its components. */
export interface JIDInit {
  node?: string | null;
  domain: string | null;
  resource?: string | null;
}

export class JID {
  readonly node: string | null;
  readonly domain: string;
  readonly resource: string | null;

  private readonly _bareJID: string;
  private readonly _fullJID: string;

  /**
   * @throws {IllegalJIDError} If the JID is not valid. Malformed text is
   *   reported as the {@link InvalidJIDError} subclass.
   */
  constructor(jid: string | null | undefined, options?: JIDOptions);
  constructor(parts: JIDInit, options?: JIDOptions);
  constructor(
    source: string | JIDInit | null | undefined,
    options: JIDOptions = {}
  ) {
    const parts: JIDParts =
      typeof source === "object" && source !== null
        ? {
            node: source.node ?? null,
            domain: source.domain,
            resource: source.resource ?? null,
          }
        : parseJIDParts(source);

    let { node, resource } = parts;
    const domain = parts.domain;
    if (domain === null) {
      throw new IllegalJIDError(literalOf(parts), {
        reason: "domain cannot be null",
      });
    }

    if (options.skipStringprep) {
      this.node = node;
      this.domain = domain;
      this.resource = resource;
    } else {
      if (node === "") {
        node = null;
      }
      if (resource === "") {
        resource = null;
      }
      const normalizer = options.normalizer ?? defaultNormalizer();
      try {
        this.node = normalizer.nodeprep(node);
        this.domain = normalizer.domainprep(domain);
        this.resource = normalizer.resourceprep(resource);
      } catch (err) {
        throw new IllegalJIDError(literalOf({ node, domain, resource }), {
          cause: err,
        });
      }
    }

    this._bareJID =
      this.node !== null ? `${this.node}@${this.domain}` : this.domain;
    this._fullJID =
      this.resource !== null
        ? `${this._bareJID}/${this.resource}`
        : this._bareJID;
    Object.freeze(this);
  }

  /**
   * Build a JID from its textual form.
   *
   * @throws {IllegalJIDError} If the JID is not valid.
   */
  static parse(jid: string, options?: JIDOptions): JID {
    return new JID(jid, options);
  }

  /**
   * Build a JID from a node, domain and resource.
   *
   * @throws {IllegalJIDError} If the JID is not valid.
   */
  static of(
    node: string | null,
    domain: string,
    resource: string | null = null,
    options?: JIDOptions
  ): JID {
    return new JID({ node, domain, resource }, options);
  }

  /**
   * Whether two textual JIDs are equivalent once prepared, e.g.
   * `User@EXAMPLE.com/home` and `user@example.com/home`.
   *
   * @throws {IllegalJIDError} If either JID is not valid.
   */
  static equals(jid1: string, jid2: string): boolean {
    return new JID(jid1).equals(new JID(jid2));
  }

  /** Comparator for sorting JIDs; see {@link JID.compareTo}. */
  static compare(this: void, a: JID, b: JID): number {
    return a.compareTo(b);
  }

  static escapeNode(node: string): string {
    return escapeNode(node);
  }

  static unescapeNode(node: string): string {
    return unescapeNode(node);
  }

  /**
   * Prepare a resource with the process-wide normalizer.
   *
   * @throws {NormalizationError} If resourceprep rejects the value.
   * @throws {LengthExceededError} If the prepared value is too long.
   */
  static resourceprep(resource: string | null): string | null {
    return defaultNormalizer().resourceprep(resource);
  }

  /** The JID without its resource, e.g. `user@example.com`. */
  toBareJID(): string {
    return this._bareJID;
  }

  /**
   * The JID including its resource, e.g. `user@example.com/mobile`.
   *
   * @throws {NoResourceError} If this JID has no resource.
   */
  toFullJID(): string {
    if (this.resource === null) {
      throw new NoResourceError(this._bareJID);
    }
    return this._fullJID;
  }

  isBareJID(): boolean {
    return this.resource === null;
  }

  isFullJID(): boolean {
    return this.resource !== null;
  }

  /** This JID with the resource removed. */
  asBareJID(): JID {
    if (this.resource === null) {
      return this;
    }
    return new JID(
      { node: this.node, domain: this.domain },
      { skipStringprep: true }
    );
  }

  /**
   * This JID with a different resource. Only the new resource is prepared.
   *
   * @throws {IllegalJIDError} If the resource is not valid.
   */
  withResource(resource: string | null, options: JIDOptions = {}): JID {
    let prepared = resource;
    if (!options.skipStringprep) {
      const normalizer = options.normalizer ?? defaultNormalizer();
      try {
        prepared = normalizer.resourceprep(resource);
      } catch (err) {
        throw new IllegalJIDError(
          literalOf({ node: this.node, domain: this.domain, resource }),
          { cause: err }
        );
      }
    }
    return new JID(
      { node: this.node, domain: this.domain, resource: prepared },
      { skipStringprep: true }
    );
  }

  /** Node, domain and resource are equal as prepared strings. */
  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    if (!(other instanceof JID)) {
      return false;
    }
    return (
      this.node === other.node &&
      this.domain === other.domain &&
      this.resource === other.resource
    );
  }

  /**
   * Order by domain, then node, then resource. A missing node or resource
   * sorts as the empty string.
   */
  compareTo(other: JID): number {
    return (
      compareStrings(this.domain, other.domain) ||
      compareStrings(this.node ?? "", other.node ?? "") ||
      compareStrings(this.resource ?? "", other.resource ?? "")
    );
  }

  /** 32-bit hash of the full form; equal JIDs have equal hashes. */
  hashCode(): number {
    let h = 0;
    for (let i = 0; i < this._fullJID.length; i++) {
      h = (Math.imul(31, h) + this._fullJID.charCodeAt(i)) | 0;
    }
    return h;
  }

  /** The full form, or the bare form when there is no resource. */
  toString(): string {
    return this._fullJID;
  }

  toJSON(): string {
    return this._fullJID;
  }
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function literalOf(parts: JIDParts): string {
  let literal = parts.node !== null ? `${parts.node}@` : "";
  literal += parts.domain ?? "";
  if (parts.resource !== null) {
    literal += `/${parts.resource}`;
  }
  return literal;
}
