/**
 * jid parse -- Parse, prepare and print the parts of a JID.
 */

import { JID } from "../../protocol/jid.js";
import { cliError, describeError } from "../helpers.js";

export function parseCommand(
  address: string,
  options: { json?: boolean } = {}
): void {
  let jid: JID;
  try {
    jid = new JID(address);
  } catch (err) {
    cliError(`Error: ${describeError(err)}`);
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          node: jid.node,
          domain: jid.domain,
          resource: jid.resource,
          bare: jid.toBareJID(),
          full: jid.toString(),
        },
        null,
        2
      )
    );
    return;
  }

  console.log(`Node:     ${jid.node ?? "(none)"}`);
  console.log(`Domain:   ${jid.domain}`);
  console.log(`Resource: ${jid.resource ?? "(none)"}`);
  console.log(`Bare JID: ${jid.toBareJID()}`);
  console.log(`Full JID: ${jid.toString()}`);
}
