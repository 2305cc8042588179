/**
 * jid CLI entry point.
 */

import { createProgram } from "./program.js";

createProgram().parse(process.argv);
