import { AppError } from './app.error';

export class InvalidDigestFormatError extends AppError {
  constructor(message = 'Invalid SHA-1 hash provided.') {
    super(message, 400, 'INVALID_DIGEST_FORMAT');
  }
}

export class NoDataProvidedError extends AppError {
  constructor(message = 'No breach data provided.') {
    super(message, 400, 'NO_DATA_PROVIDED');
  }
}

export class UpstreamUnavailableError extends AppError {
  constructor(message = 'Error communicating with AI service.') {
    super(message, 503, 'UPSTREAM_UNAVAILABLE');
  }
}

export class MisconfiguredCredentialError extends AppError {
  constructor(message = 'Google API key not configured.') {
    super(message, 500, 'MISCONFIGURED_CREDENTIAL');
  }
}
