/** Base class for failures that map onto a client-facing HTTP status. */
export class GatewayError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'GatewayError';
    this.status = status;
  }
}

/** Missing or malformed request input. Never retried, never logged as a fault. */
export class ClientInputError extends GatewayError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ClientInputError';
  }
}

export class UnknownModelError extends GatewayError {
  readonly modelName: string;
  readonly validModels: readonly string[];

  constructor(modelName: string, validModels: readonly string[]) {
    super(`Unknown model. Use one of: ${validModels.join(', ')}`, 400);
    this.name = 'UnknownModelError';
    this.modelName = modelName;
    this.validModels = validModels;
  }
}
