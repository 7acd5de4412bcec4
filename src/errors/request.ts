import { GatewayError } from './base.js';

export class InvalidRequestError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'invalid_request_error', 400, cause);
  }
}

export class NotFoundError extends GatewayError {
  constructor(message = 'Not found') {
    super(message, 'not_found', 404);
  }
}
