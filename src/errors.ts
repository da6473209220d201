export class ValidationError extends Error {
  readonly details: string[];

  constructor(details: string[]) {
    super('Validation failed');
    this.name = 'ValidationError';
    this.details = details;
  }
}

export class ExpenseNotFoundError extends Error {
  readonly expenseId: string;

  constructor(expenseId: string) {
    super(`Expense not found: ${expenseId}`);
    this.name = 'ExpenseNotFoundError';
    this.expenseId = expenseId;
  }
}

// Raised when a persisted blob cannot be read back
export class StorageFormatError extends Error {
  readonly key: string;

  constructor(key: string, reason: string) {
    super(`Malformed data under "${key}": ${reason}`);
    this.name = 'StorageFormatError';
    this.key = key;
  }
}
