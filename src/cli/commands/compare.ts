/**
 * jid compare -- Report whether two JIDs are equivalent once prepared.
 */

import { JID } from "../../protocol/jid.js";
import { cliError, describeError } from "../helpers.js";

export function compareCommand(jid1: string, jid2: string): void {
  let equal: boolean;
  try {
    equal = JID.equals(jid1, jid2);
  } catch (err) {
    cliError(`Error: ${describeError(err)}`);
  }
  console.log(equal ? "equal" : "different");
}
