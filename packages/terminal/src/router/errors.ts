// Router errors

export class DuplicateCommandError extends Error {
  readonly command: string;

  constructor(command: string) {
    super(`command "${command}" is already registered`);
    this.name = 'DuplicateCommandError';
    this.command = command;
  }
}

export class UnknownCommandError extends Error {
  readonly command: string;

  constructor(command: string, available: readonly string[]) {
    super(`invalid choice: '${command}' (choose from ${available.map(a => `'${a}'`).join(', ')})`);
    this.name = 'UnknownCommandError';
    this.command = command;
  }
}
