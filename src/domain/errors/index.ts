// Base class for domain errors - includes HTTP status for easy mapping
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ProductNotFoundError extends DomainError {
  constructor(public readonly productName: string) {
    super(`No product named '${productName}' in the catalog.`, 'PRODUCT_NOT_FOUND', 404);
  }
}

export class CartLineNotFoundError extends DomainError {
  constructor(
    public readonly productName: string,
    public readonly variant?: string
  ) {
    super(
      variant
        ? `Cart has no '${productName}' in variant '${variant}'.`
        : `Cart has no '${productName}' without a variant.`,
      'CART_LINE_NOT_FOUND',
      404
    );
  }
}

// 422 - nothing (resolvable) to turn into an order
export class EmptyCartError extends DomainError {
  constructor(message = 'Cannot place an order without any items.') {
    super(message, 'EMPTY_CART', 422);
  }
}

export class PersistenceError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_ERROR', 500, { cause });
  }
}

// 503 - catalog is treated as absent, callers decide how to degrade
export class CatalogUnavailableError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CATALOG_UNAVAILABLE', 503, { cause });
  }
}

// 410 Gone - cart existed but expired
export class CartExpiredError extends DomainError {
  constructor(cartId: string) {
    super(
      `Cart session '${cartId}' has expired. Please create a new cart.`,
      'CART_EXPIRED',
      410
    );
  }
}

export class ResourceNotFoundError extends DomainError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} with identifier '${identifier}' not found.`,
      'RESOURCE_NOT_FOUND',
      404
    );
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}
