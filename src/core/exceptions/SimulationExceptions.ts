export class ConfigurationError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class AssemblerError extends Error {
  readonly line: number;
  readonly source: string;

  constructor(message: string, line: number, source: string) {
    super(`${message} (line ${line}: '${source.trim()}')`);
    this.line = line;
    this.source = source;
    this.name = "AssemblerError";
  }
}

export class ProgramFormatError extends Error {
  readonly line: number;
  readonly text: string;

  constructor(line: number, text: string, reason: string) {
    super(`Malformed program line ${line}: ${reason}`);
    this.line = line;
    this.text = text;
    this.name = "ProgramFormatError";
  }
}
