export class LogLineParseError extends Error {
  public readonly line: string;

  constructor(options: { line: string; message?: string; cause?: unknown }) {
    super(options.message ?? 'Log line is not a JSON object', { cause: options.cause });
    Object.setPrototypeOf(this, LogLineParseError.prototype);
    this.name = 'LogLineParseError';
    this.line = options.line;
  }
}
