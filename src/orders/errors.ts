export type OrdersFileErrorReason = "not_found" | "unreadable" | "invalid_json" | "invalid_shape";

/**
 * The orders file could not be loaded. Raised by OrdersStore; the HTTP layer
 * maps it to a 500 with the reason in details.
 */
export class OrdersFileError extends Error {
  readonly code = "ORDERS_FILE_ERROR";

  constructor(
    readonly path: string,
    readonly reason: OrdersFileErrorReason,
    message: string,
  ) {
    super(`Orders file ${path}: ${message}`);
    this.name = "OrdersFileError";
  }
}

export class OrderNotFoundError extends Error {
  readonly code = "ORDER_NOT_FOUND";

  constructor(readonly orderId: string) {
    super(`Order ${orderId} is not in the orders file`);
    this.name = "OrderNotFoundError";
  }
}

/**
 * No order number was given and none could be detected in the document.
 */
export class OrderIdMissingError extends Error {
  readonly code = "ORDER_ID_MISSING";

  constructor() {
    super("No order number found in the document");
    this.name = "OrderIdMissingError";
  }
}
