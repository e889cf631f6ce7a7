/**
 * Item Domain Errors
 *
 * Thrown by the service layer and mapped to HTTP status codes by route handlers
 */

export class ItemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ItemError';
  }
}

/**
 * Missing items and items owned by someone else are reported the same way.
 */
export class ItemNotFoundError extends ItemError {
  constructor() {
    super('Item not found');
    this.name = 'ItemNotFoundError';
  }
}

export class InvalidItemError extends ItemError {
  constructor(reason: string) {
    super(`Invalid item: ${reason}`);
    this.name = 'InvalidItemError';
  }
}
