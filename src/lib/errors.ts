// ERROR TYPES
// Input, provider and configuration failures raised by the service clients

/**
 * Referenced media file does not exist. Raised before any request is issued.
 */
export class MediaNotFoundError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'MediaNotFoundError';
    this.filePath = filePath;
  }
}

/**
 * Provider answered with a non-success HTTP status
 */
export class ProviderError extends Error {
  readonly provider: string;
  readonly status: number;
  readonly body?: string;

  constructor(provider: string, status: number, message: string, body?: string) {
    super(message);
    this.name = 'ProviderError';
    this.provider = provider;
    this.status = status;
    this.body = body;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
