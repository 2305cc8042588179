/**
 * jid CLI -- inspect, prepare and escape JIDs from the command line.
 */

import { Argument, Command } from "commander";

import { COMPONENT_KINDS, type ComponentKind } from "../protocol/types.js";
import { parseCommand } from "./commands/parse.js";
import { escapeCommand, unescapeCommand } from "./commands/escape.js";
import { compareCommand } from "./commands/compare.js";
import { prepCommand } from "./commands/prep.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("jid")
    .description("Parse, prepare and escape XMPP addresses (JIDs)")
    .version("0.1.0");

  // ---- parse ---------------------------------------------------------------
  program
    .command("parse <address>")
    .description("Prepare a JID and print its node, domain and resource")
    .option("--json", "Print the parts as JSON")
    .action((address: string, opts: { json?: boolean }) => {
      parseCommand(address, { json: opts.json });
    });

  // ---- escape --------------------------------------------------------------
  program
    .command("escape <node>")
    .description("Escape a node so it can be used in a JID (XEP-0106)")
    .action((node: string) => {
      escapeCommand(node);
    });

  // ---- unescape ------------------------------------------------------------
  program
    .command("unescape <node>")
    .description("Reverse JID node escaping")
    .action((node: string) => {
      unescapeCommand(node);
    });

  // ---- compare -------------------------------------------------------------
  program
    .command("compare <jid1> <jid2>")
    .description("Check whether two JIDs are equivalent once prepared")
    .action((jid1: string, jid2: string) => {
      compareCommand(jid1, jid2);
    });

  // ---- prep ----------------------------------------------------------------
  program
    .command("prep")
    .description("Run one JID part through its stringprep profile")
    .addArgument(
      new Argument("<kind>", "Part kind").choices([...COMPONENT_KINDS])
    )
    .argument("<value>", "Value to prepare")
    .action((kind: ComponentKind, value: string) => {
      prepCommand(kind, value);
    });

  return program;
}
