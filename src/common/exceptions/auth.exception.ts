import { HttpException, HttpStatus } from '@nestjs/common';

export enum AuthErrorCode {
  RATE_LIMITED = 'RATE_LIMITED',
  NOT_FOUND = 'NOT_FOUND',
  EXPIRED = 'EXPIRED',
  CODE_MISMATCH = 'CODE_MISMATCH',
  TOO_MANY_ATTEMPTS = 'TOO_MANY_ATTEMPTS',
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  WRONG_TYPE = 'WRONG_TYPE',
  REVOKED = 'REVOKED',
  INVALID_TOKEN = 'INVALID_TOKEN',
  INVALID_PHONE_NUMBER = 'INVALID_PHONE_NUMBER',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  IDENTITY_STORE_UNAVAILABLE = 'IDENTITY_STORE_UNAVAILABLE',
  DISPATCH_FAILED = 'DISPATCH_FAILED',
}

interface ErrorDescriptor {
  status: HttpStatus;
  message: string;
  /** Infrastructure failures, as opposed to outcomes a user can act on. */
  infrastructure: boolean;
}

const ERROR_DESCRIPTORS: Record<AuthErrorCode, ErrorDescriptor> = {
  [AuthErrorCode.RATE_LIMITED]: {
    status: HttpStatus.TOO_MANY_REQUESTS,
    message: 'Too many verification codes requested. Try again later.',
    infrastructure: false,
  },
  [AuthErrorCode.NOT_FOUND]: {
    status: HttpStatus.BAD_REQUEST,
    message: 'No pending verification code. Request a new one.',
    infrastructure: false,
  },
  [AuthErrorCode.EXPIRED]: {
    status: HttpStatus.UNAUTHORIZED,
    message: 'The code or token has expired.',
    infrastructure: false,
  },
  [AuthErrorCode.CODE_MISMATCH]: {
    status: HttpStatus.BAD_REQUEST,
    message: 'The verification code is incorrect.',
    infrastructure: false,
  },
  [AuthErrorCode.TOO_MANY_ATTEMPTS]: {
    status: HttpStatus.TOO_MANY_REQUESTS,
    message: 'Too many incorrect attempts. Request a new code.',
    infrastructure: false,
  },
  [AuthErrorCode.INVALID_SIGNATURE]: {
    status: HttpStatus.UNAUTHORIZED,
    message: 'The token is not valid.',
    infrastructure: false,
  },
  [AuthErrorCode.WRONG_TYPE]: {
    status: HttpStatus.UNAUTHORIZED,
    message: 'The token is not valid for this operation.',
    infrastructure: false,
  },
  [AuthErrorCode.REVOKED]: {
    status: HttpStatus.UNAUTHORIZED,
    message: 'The token has been revoked.',
    infrastructure: false,
  },
  [AuthErrorCode.INVALID_TOKEN]: {
    status: HttpStatus.UNAUTHORIZED,
    message: 'The token is not valid.',
    infrastructure: false,
  },
  [AuthErrorCode.INVALID_PHONE_NUMBER]: {
    status: HttpStatus.BAD_REQUEST,
    message: 'The phone number is not valid.',
    infrastructure: false,
  },
  [AuthErrorCode.STORE_UNAVAILABLE]: {
    status: HttpStatus.SERVICE_UNAVAILABLE,
    message: 'Authentication is temporarily unavailable.',
    infrastructure: true,
  },
  [AuthErrorCode.IDENTITY_STORE_UNAVAILABLE]: {
    status: HttpStatus.SERVICE_UNAVAILABLE,
    message: 'Authentication is temporarily unavailable.',
    infrastructure: true,
  },
  [AuthErrorCode.DISPATCH_FAILED]: {
    status: HttpStatus.BAD_GATEWAY,
    message: 'The verification code could not be delivered. Request a new one.',
    infrastructure: true,
  },
};

export type AuthErrorDetails = Record<string, string | number>;

/**
 * Error with a stable machine-readable code and a generic message.
 * Response body: `{ statusCode, error, message, ...details }`.
 */
export class AuthException extends HttpException {
  constructor(
    readonly code: AuthErrorCode,
    readonly details: AuthErrorDetails = {},
  ) {
    const descriptor = ERROR_DESCRIPTORS[code];
    super(
      {
        statusCode: descriptor.status,
        error: code,
        message: descriptor.message,
        ...details,
      },
      descriptor.status,
    );
  }

  get isInfrastructureFailure(): boolean {
    return ERROR_DESCRIPTORS[this.code].infrastructure;
  }
}

export class RateLimitedException extends AuthException {
  constructor(readonly retryAfterSeconds: number) {
    super(AuthErrorCode.RATE_LIMITED, { retryAfterSeconds });
  }
}

export class StoreUnavailableException extends AuthException {
  constructor() {
    super(AuthErrorCode.STORE_UNAVAILABLE);
  }
}

export const isAuthError = (error: unknown, ...codes: AuthErrorCode[]): error is AuthException =>
  error instanceof AuthException && (codes.length === 0 || codes.includes(error.code));
