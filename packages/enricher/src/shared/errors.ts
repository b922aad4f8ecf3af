export class AppError extends Error {
  constructor(
    public exitCode: number,
    public code: string,
    message: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(1, 'CONFIGURATION_ERROR', message);
  }
}

export class ExportError extends AppError {
  constructor(message: string) {
    super(2, 'EXPORT_ERROR', message);
  }
}
