/**
 * jid prep -- Run a single JID part through its stringprep profile.
 */

import type { ComponentKind } from "../../protocol/types.js";
import { defaultNormalizer } from "../../sdk/defaults.js";
import { cliError, describeError } from "../helpers.js";

export function prepCommand(kind: ComponentKind, value: string): void {
  let prepared: string | null;
  try {
    prepared = defaultNormalizer().normalize(kind, value);
  } catch (err) {
    cliError(`Error: ${describeError(err)}`);
  }
  console.log(prepared ?? "(none)");
}
