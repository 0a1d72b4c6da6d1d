// Lightweight error type that carries an HTTP status code for centralized handling.
export class HttpError extends Error {
  status: number;
  code: string;

  // Accepts a status, message and machine-readable code so callers can throw domain-specific HTTP errors.
  constructor(status: number, message: string, code = 'HTTP_ERROR') {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

// Cart line (or session) absent on update/remove.
export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message, 'NOT_FOUND');
  }
}

// A merged cart line would exceed the per-line quantity cap.
export class QuantityLimitError extends HttpError {
  constructor(limit: number) {
    super(400, `Quantity exceeds the per-line limit of ${limit}`, 'QUANTITY_LIMIT');
  }
}

export class EmptyCartError extends HttpError {
  constructor() {
    super(400, 'Cart is empty', 'EMPTY_CART');
  }
}

export class InvalidDiscountCodeError extends HttpError {
  constructor() {
    super(400, 'Invalid discount code', 'INVALID_DISCOUNT_CODE');
  }
}

export class DiscountAlreadyUsedError extends HttpError {
  constructor() {
    super(400, 'Discount code has already been used', 'DISCOUNT_ALREADY_USED');
  }
}

// Unexpected failure. The message stays generic; the underlying error is logged and kept on `cause`.
export class InternalFailureError extends HttpError {
  constructor(message: string, cause?: unknown) {
    super(500, message, 'INTERNAL_FAILURE');
    this.cause = cause;
  }
}
