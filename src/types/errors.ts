/**
 * Error types shared across services and controllers
 */

export class ConfigurationError extends Error {
  public details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

export class SyncInProgressError extends Error {
  constructor(message: string = 'Email synchronization is already in progress') {
    super(message);
    this.name = 'SyncInProgressError';
  }
}

export class ProviderNotAuthenticatedError extends Error {
  constructor(message: string = 'Mail provider is not authenticated') {
    super(message);
    this.name = 'ProviderNotAuthenticatedError';
  }
}

export class SyncCancelledError extends Error {
  constructor(message: string = 'Sync cancelled') {
    super(message);
    this.name = 'SyncCancelledError';
  }
}
