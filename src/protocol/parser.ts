/**
 * Textual JID parsing.
 *
 * A JID has the form `[node "@"] domain ["/" resource]`. Parsing only splits
 * the text; no stringprep is applied and no part is validated beyond the
 * shape checks below.
 */

import { InvalidJIDError } from "./errors.js";
import type { JIDParts } from "./types.js";

/**
 * Split a textual JID into its raw node, domain and resource.
 *
 * - An `@` only separates the node when it comes before the first `/`;
 *   later ones belong to the resource.
 * - A leading `@` yields no node.
 * - A trailing `/` yields no resource (not an empty one).
 * - `null` or `undefined` yields all parts `null`.
 *
 * @throws {InvalidJIDError} If `jid` ends with the node separator.
 */
export function parseJIDParts(jid: string | null | undefined): JIDParts {
  if (jid === null || jid === undefined) {
    return { node: null, domain: null, resource: null };
  }

  const slashIndex = jid.indexOf("/");
  const domainEnd = slashIndex < 0 ? jid.length : slashIndex;
  let atIndex = jid.indexOf("@");
  if (atIndex >= domainEnd) {
    atIndex = -1;
  }

  if (atIndex >= 0 && atIndex === jid.length - 1) {
    throw new InvalidJIDError(jid, "empty domain");
  }

  const node = atIndex > 0 ? jid.slice(0, atIndex) : null;
  const domain = jid.slice(atIndex + 1, domainEnd);
  const resource =
    slashIndex < 0 || slashIndex === jid.length - 1
      ? null
      : jid.slice(slashIndex + 1);

  return { node, domain, resource };
}
