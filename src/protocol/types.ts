/**
 * Core types and constants for JID handling.
 */

/** The three parts of a JID, each with its own preparation profile. */
export type ComponentKind = "node" | "domain" | "resource";

export const COMPONENT_KINDS: readonly ComponentKind[] = [
  "node",
  "domain",
  "resource",
];

/** Maximum encoded size of a single JID component, in bytes. */
export const MAX_COMPONENT_BYTES = 1023;

/**
 * How a component's encoded size is measured.
 *
 * - `utf8`: the exact UTF-8 byte count.
 * - `utf16`: two bytes per UTF-16 code unit.
 */
export type LengthMode = "utf8" | "utf16";

export const LENGTH_MODES: readonly LengthMode[] = ["utf8", "utf16"];

/** Raw, un-normalized parts of a textual JID. */
export interface JIDParts {
  readonly node: string | null;
  readonly domain: string | null;
  readonly resource: string | null;
}

const utf8 = new TextEncoder();

/**
 * Return the encoded size of `value` in bytes.
 */
export function encodedSize(value: string, mode: LengthMode): number {
  return mode === "utf16" ? value.length * 2 : utf8.encode(value).length;
}
