import type { ErrorType } from '../types/openai.types.js';

export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly type: ErrorType,
    public readonly statusCode: number,
    public override readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
