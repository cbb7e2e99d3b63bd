export class ReportWriteError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'ReportWriteError';
  }
}
