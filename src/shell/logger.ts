/**
 * Diagnostic logger for a shell session. Every line carries the program
 * tag so shell messages stand apart from jq's own diagnostics.
 */
export class ShellLogger {
  constructor(
    private readonly stream: NodeJS.WritableStream = process.stderr,
    readonly prefix: string = "jqsh: ",
  ) {}

  log(...parts: unknown[]): void {
    const message = parts.map((part) => (part instanceof Error ? part.message : String(part))).join(" ");
    this.stream.write(`${this.prefix}${message}\n`);
  }
}
