/**
 * JID node escaping (XEP-0106).
 *
 * Escaping replaces the characters nodeprep prohibits with `\XX` sequences so
 * that identifiers from external sources (e.g. an LDAP user "Joe Smith") can
 * become JID nodes ("joe\20smith@example.com" once prepared).
 *
 * Escaping and un-escaping are never applied implicitly by JID construction;
 * callers do it at the point where foreign identifiers enter the system.
 */

/** Unescaped character to escape sequence. */
export const NODE_ESCAPES: Readonly<Record<string, string>> = Object.freeze({
  " ": "\\20",
  '"': "\\22",
  "&": "\\26",
  "'": "\\27",
  "/": "\\2f",
  ":": "\\3a",
  "<": "\\3c",
  ">": "\\3e",
  "@": "\\40",
  "\\": "\\5c",
});

// Escape sequence (without the backslash) to unescaped character.
const NODE_UNESCAPES: ReadonlyMap<string, string> = new Map(
  Object.entries(NODE_ESCAPES).map(([ch, seq]) => [seq.slice(1), ch])
);

// Space, line and paragraph separators plus the ASCII controls that act as
// whitespace. No-break spaces (U+00A0, U+2007, U+202F) and U+FEFF are not
// whitespace here and pass through unescaped.
const WHITESPACE_RE =
  /(?![\u00A0\u2007\u202F])[\t-\r\u001C-\u001F\p{Zs}\u2028\u2029]/u;

/**
 * Escape the node portion of a JID.
 *
 * Any whitespace character becomes `\20`. Escaping is not idempotent:
 * escaping an escaped node escapes its backslashes again.
 */
export function escapeNode(node: string): string;
export function escapeNode(node: string | null): string | null;
export function escapeNode(node: string | null): string | null {
  if (node === null) {
    return null;
  }
  let out = "";
  for (const ch of node) {
    const seq = NODE_ESCAPES[ch];
    if (seq !== undefined) {
      out += seq;
    } else if (WHITESPACE_RE.test(ch)) {
      out += "\\20";
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Un-escape the node portion of a JID.
 *
 * Only the sequences in {@link NODE_ESCAPES} are recognized; a backslash
 * followed by anything else is copied through unchanged.
 */
export function unescapeNode(node: string): string;
export function unescapeNode(node: string | null): string | null;
export function unescapeNode(node: string | null): string | null {
  if (node === null) {
    return null;
  }
  let out = "";
  for (let i = 0; i < node.length; i++) {
    const c = node[i];
    if (c === "\\" && i + 2 < node.length) {
      const ch = NODE_UNESCAPES.get(node.slice(i + 1, i + 3));
      if (ch !== undefined) {
        out += ch;
        i += 2;
        continue;
      }
    }
    out += c;
  }
  return out;
}
