export class DatabaseOpenError extends Error {
  constructor(
    readonly dbPath: string,
    cause: unknown,
  ) {
    super(`Can't open database at ${dbPath}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'DatabaseOpenError';
  }
}

export class LessonWriteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LessonWriteError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class LessonImportError extends Error {
  constructor(
    readonly filePath: string,
    readonly issues: string[],
  ) {
    super(`Could not import lessons from ${filePath}: ${issues.join('; ')}`);
    this.name = 'LessonImportError';
  }
}
