export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function validateNotBlank(value: string | undefined, errorMessage: string) {
  if (value == null || value.trim().length === 0) {
    throw new ConfigurationError(errorMessage);
  }
}

export function validatePositiveInteger(value: number, errorMessage: string) {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(errorMessage);
  }
}

export function validateUrl(value: string, errorMessage: string) {
  try {
    new URL(value);
  } catch {
    throw new ConfigurationError(`${errorMessage}: ${value}`);
  }
}
