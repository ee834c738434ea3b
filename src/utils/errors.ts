export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class InvalidParameterError extends AppError {
  constructor(message: string) {
    super(400, 'INVALID_PARAMETER', message);
  }
}

export class InvalidPredictionError extends AppError {
  constructor(message: string) {
    super(400, 'INVALID_PREDICTION', message);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(401, 'UNAUTHENTICATED', message);
  }
}

export class UnauthorizedError extends AppError {
  constructor(role: string) {
    super(403, 'UNAUTHORIZED', `Caller does not hold the ${role} role`);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

export class MarketClosedError extends AppError {
  constructor(message: string = 'Market is not accepting predictions') {
    super(409, 'MARKET_CLOSED', message);
  }
}

export class MarketNotResolvedError extends AppError {
  constructor() {
    super(409, 'MARKET_NOT_RESOLVED', 'Market is not resolved yet');
  }
}

export class AlreadyResolvedError extends AppError {
  constructor() {
    super(409, 'ALREADY_RESOLVED', 'Market is already resolved');
  }
}

export class AlreadyClaimedError extends AppError {
  constructor() {
    super(409, 'ALREADY_CLAIMED', 'Winnings were already claimed');
  }
}

export class InconsistentStateError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(409, 'INCONSISTENT_STATE', message, details);
  }
}

export class InsufficientBalanceError extends AppError {
  constructor(account: string) {
    super(422, 'INSUFFICIENT_BALANCE', `Insufficient balance in account ${account}`, { account });
  }
}

export class StoreError extends AppError {
  constructor(operation: string, cause?: string) {
    super(500, 'STORE_ERROR', `Store operation failed: ${operation}`, cause ? { cause } : undefined);
  }
}
