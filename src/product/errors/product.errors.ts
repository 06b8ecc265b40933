import { errorMessage } from '../../common/errors';

export class ProductNotFoundError extends Error {
  constructor(readonly productId: string) {
    super(`Product with ID ${productId} not found`);
    this.name = 'ProductNotFoundError';
  }
}

/**
 * Failure of the underlying store: connectivity, constraint violation,
 * transaction failure or cancellation. `operation` names the repository call.
 */
export class StorageError extends Error {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(`Storage operation '${operation}' failed: ${errorMessage(cause)}`, { cause });
    this.name = 'StorageError';
  }

  static wrap(operation: string, error: unknown): Error {
    if (error instanceof ProductNotFoundError || error instanceof StorageError) {
      return error;
    }
    return new StorageError(operation, error);
  }
}
