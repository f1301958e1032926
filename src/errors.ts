export class CliError extends Error {
  constructor(message: string, public readonly exitCode: number = 1) {
    super(message);
    this.name = 'CliError';
  }
}

export class RuntimeCommandError extends CliError {
  constructor(message: string, exitCode: number, public readonly args: readonly string[]) {
    super(message, exitCode);
    this.name = 'RuntimeCommandError';
  }
}
