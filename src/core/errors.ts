import type { AddLeadsResult } from '../storage/leadStore';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SearchValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SearchValidationError';
  }
}

// Raised after the batch finished; `partial` holds what was committed.
export class PersistenceError extends Error {
  constructor(message: string, readonly partial: AddLeadsResult) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
