/**
 * Error types shared by the shell, the command library and the jq wrapper.
 *
 * Every error carries a `kind` tag so callers can branch on the variant
 * without identity comparisons against shared sentinel values.
 */

export type ShellErrorKind =
  | "malformed-command"
  | "unknown-command"
  | "stack-empty"
  | "no-input"
  | "exec"
  | "launch"
  | "cancelled"
  | "exit-status"
  | "usage"
  | "configuration"
  | "quit"
  | "jq-not-found"
  | "jq-version";

export abstract class ShellError extends Error {
  abstract readonly kind: ShellErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedCommandError extends ShellError {
  override readonly name = "MalformedCommandError";
  readonly kind = "malformed-command";

  constructor(
    message: string,
    readonly line: string,
  ) {
    super(message);
  }
}

export class UnknownCommandError extends ShellError {
  override readonly name = "UnknownCommandError";
  readonly kind = "unknown-command";

  constructor(readonly command: string) {
    super(`${command}: unknown command`);
  }
}

export class StackEmptyError extends ShellError {
  override readonly name = "StackEmptyError";
  readonly kind = "stack-empty";

  constructor() {
    super("the stack is empty");
  }
}

export class NoInputError extends ShellError {
  override readonly name = "NoInputError";
  readonly kind = "no-input";

  constructor() {
    super("no input has been declared");
  }
}

/**
 * Wraps a failure with the command line that produced it. The message reads
 * `name: cause` so top-level logging is uniform.
 */
export class ExecError extends ShellError {
  override readonly name = "ExecError";
  readonly kind = "exec";

  constructor(
    readonly command: string,
    readonly args: readonly string[],
    cause: unknown,
  ) {
    super(`${command}: ${errorMessage(cause)}`, { cause });
  }
}

export class LaunchError extends ShellError {
  override readonly name = "LaunchError";
  readonly kind = "launch";

  constructor(
    readonly program: string,
    cause: unknown,
  ) {
    super(`unable to start ${program}: ${errorMessage(cause)}`, { cause });
  }
}

export class CancelledError extends ShellError {
  override readonly name = "CancelledError";
  readonly kind = "cancelled";

  constructor(readonly program: string) {
    super(`${program} was terminated`);
  }
}

export class ExitStatusError extends ShellError {
  override readonly name = "ExitStatusError";
  readonly kind = "exit-status";

  constructor(
    readonly program: string,
    readonly code: number | null,
    readonly signal: NodeJS.Signals | null = null,
    readonly diagnostics = "",
  ) {
    const status = code === null ? `signal ${signal ?? "unknown"}` : `exit status ${code}`;
    super(diagnostics ? `${diagnostics} (${status})` : status);
  }
}

export class UsageError extends ShellError {
  override readonly name = "UsageError";
  readonly kind = "usage";
}

export class ConfigurationError extends ShellError {
  override readonly name = "ConfigurationError";
  readonly kind = "configuration";
}

/**
 * Raised by the quit command. The session loop stops when it finds one of
 * these anywhere in an error's cause chain.
 */
export class QuitRequest extends ShellError {
  override readonly name = "QuitRequest";
  readonly kind = "quit";

  constructor() {
    super("exit");
  }
}

export class JQNotFoundError extends ShellError {
  override readonly name = "JQNotFoundError";
  readonly kind = "jq-not-found";

  constructor() {
    super("jq executable not found");
  }
}

export class JQVersionError extends ShellError {
  override readonly name = "JQVersionError";
  readonly kind = "jq-version";
}

export function isShellError(err: unknown): err is ShellError {
  return err instanceof ShellError;
}

/**
 * Report whether err, or any error it wraps, is a quit request.
 */
export function isQuit(err: unknown): boolean {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof QuitRequest) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
