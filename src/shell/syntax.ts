/**
 * Line syntax for the interactive shell
 *
 * Turns one line of input into a Command. Lines starting with ':' name a
 * command explicitly; every other line is shorthand for a common command.
 */

import { MalformedCommandError } from "../errors.js";

/**
 * A parsed command line: a command name and its arguments.
 */
export interface Command {
  name: string;
  args: string[];
}

export const SYNTAX_DOCS = `Topic syntax describes the line syntax of the shell.

Lines prefixed with a colon ':' are commands, other lines are shorthand for
specific commands.

    :<cmd> <arg1> <arg2> ...    execute cmd with the given arguments
    :<cmd> 'arg 1' "arg 2"      quote arguments containing spaces
    :<cmd> ... +<argN>          the rest of the line is one argument (argN)
    (blank line)                shorthand for ":write"
    .                           shorthand for ":write"
    ..                          shorthand for ":pop"
    ?<filter>                   shorthand for ":peek +<filter>"
    <filter>                    shorthand for ":push +<filter>"

Inside quotes a backslash escapes the quote character or another backslash.

Note that "." is a valid jq filter but pushing it on the filter stack lacks
semantic value. So "." alone on a line is used as a shorthand for ":write".
`;

type LexState = "start" | "between" | "bare" | "quoted" | "slurp";

/**
 * Parse a single line of input.
 *
 * @throws MalformedCommandError when an explicit command cannot be tokenized
 */
export function parseLine(raw: string): Command {
  const line = raw.trim();

  if (line === "" || line === ".") {
    return { name: "write", args: [] };
  }
  if (line === "..") {
    return { name: "pop", args: [] };
  }
  if (line.startsWith("?")) {
    return { name: "peek", args: [line.slice(1)] };
  }
  if (!line.startsWith(":")) {
    return { name: "push", args: [line] };
  }

  const words = tokenize(line.slice(1), line);
  if (words.length === 0) {
    return { name: "write", args: [] };
  }
  const [name, ...args] = words;
  return { name, args };
}

/**
 * Split the body of an explicit command into words.
 */
export function tokenize(body: string, line: string = body): string[] {
  const words: string[] = [];
  let state: LexState = "start";
  let word = "";
  let quote = "";
  let i = 0;

  while (i < body.length) {
    const c = body[i];

    switch (state) {
      case "start":
      case "between":
        if (/\s/.test(c)) {
          i++;
        } else if (c === "+") {
          state = "slurp";
          i++;
        } else if (c === "'" || c === '"') {
          quote = c;
          state = "quoted";
          i++;
        } else {
          state = "bare";
        }
        break;

      case "bare":
        if (/\s/.test(c)) {
          words.push(word);
          word = "";
          state = "between";
        } else {
          word += c;
        }
        i++;
        break;

      case "quoted":
        if (c === "\\") {
          const next = body[i + 1];
          if (next === undefined) {
            throw new MalformedCommandError("unexpected end-of-input following escape", line);
          }
          if (next === quote || next === "\\") {
            word += next;
          } else {
            word += c + next;
          }
          i += 2;
        } else if (c === quote) {
          const after = body[i + 1];
          if (after !== undefined && !/\s/.test(after)) {
            throw new MalformedCommandError(`string not followed by space or end-of-input "${after}"`, line);
          }
          words.push(word);
          word = "";
          state = "between";
          i++;
        } else {
          word += c;
          i++;
        }
        break;

      case "slurp":
        words.push(body.slice(i));
        return words;
    }
  }

  switch (state) {
    case "bare":
      words.push(word);
      break;
    case "quoted":
      throw new MalformedCommandError(`unterminated ${quote} string`, line);
    case "slurp":
      words.push("");
      break;
    default:
      break;
  }
  return words;
}
