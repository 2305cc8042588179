/**
 * jid escape / jid unescape -- Apply JID node escaping (XEP-0106).
 */

import { escapeNode, unescapeNode } from "../../protocol/escape.js";

export function escapeCommand(node: string): void {
  console.log(escapeNode(node));
}

export function unescapeCommand(node: string): void {
  console.log(unescapeNode(node));
}
