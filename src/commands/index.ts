/**
 * Commands Module
 *
 * The built-in command set of the shell.
 */

import { SYNTAX_DOCS } from "../shell/syntax.js";
import { cmdExec, cmdLoad, cmdPipe } from "./input.js";
import { Library } from "./library.js";
import { cmdQuit, cmdRaw, cmdWrite } from "./output.js";
import { cmdFilter, cmdPeek, cmdPop, cmdPopAll, cmdPush, cmdScript } from "./stack.js";

export { CommandFlags, synopsis, type Flag } from "./flags.js";
export { Library, type CommandHandler } from "./library.js";
export { writeOutput } from "./output.js";
export { shellQuote } from "./stack.js";

export function registerBuiltins(library: Library): Library {
  library.register("push", cmdPush);
  library.register("pop", cmdPop);
  library.register("popall", cmdPopAll);
  library.register("peek", cmdPeek);
  library.register("filter", cmdFilter);
  library.register("script", cmdScript);
  library.register("load", cmdLoad);
  library.register("exec", cmdExec);
  library.register("pipe", cmdPipe);
  library.register("write", cmdWrite);
  library.register("raw", cmdRaw);
  library.register("quit", cmdQuit);
  library.registerTopic("syntax", SYNTAX_DOCS);
  return library;
}

/** A library holding help and every built-in command. */
export function createLibrary(): Library {
  return registerBuiltins(new Library());
}
