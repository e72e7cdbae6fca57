function createCustomError(code: string, defaultMessage: string) {
  return class extends Error {
    public readonly code: string;

    constructor(message?: string) {
      super(message ?? defaultMessage);
      this.name = this.constructor.name;
      this.code = code;
      if (Error.captureStackTrace) {
        Error.captureStackTrace(this, this.constructor);
      }
    }
  };
}

export class InvalidHeaderNameError extends createCustomError(
  'ERR_INVALID_HEADER_NAME',
  'Invalid Header Name',
) {};

export class InvalidLanguageTagError extends createCustomError(
  'ERR_INVALID_LANGUAGE_TAG',
  'Invalid Language Tag',
) {};
