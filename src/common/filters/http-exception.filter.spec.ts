import { ArgumentsHost, BadRequestException, HttpStatus } from '@nestjs/common';
import { AllExceptionsFilter } from './http-exception.filter';
import {
  AuthErrorCode,
  AuthException,
  RateLimitedException,
} from '../exceptions/auth.exception';

describe('AllExceptionsFilter', () => {
  let filter: AllExceptionsFilter;
  let response: { status: jest.Mock; json: jest.Mock; setHeader: jest.Mock };
  let host: ArgumentsHost;

  beforeEach(() => {
    filter = new AllExceptionsFilter();
    response = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
      setHeader: jest.fn(),
    };
    host = {
      switchToHttp: () => ({
        getResponse: () => response,
        getRequest: () => ({ method: 'POST', url: '/auth/verify-otp' }),
      }),
    } as unknown as ArgumentsHost;
  });

  it('should render an auth error with its code and details', () => {
    filter.catch(new AuthException(AuthErrorCode.CODE_MISMATCH, { attemptsRemaining: 2 }), host);

    expect(response.status).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'CODE_MISMATCH',
      message: 'The verification code is incorrect.',
      attemptsRemaining: 2,
    });
    expect(response.setHeader).not.toHaveBeenCalled();
  });

  it('should set Retry-After for rate limited requests', () => {
    filter.catch(new RateLimitedException(420), host);

    expect(response.setHeader).toHaveBeenCalledWith('Retry-After', '420');
    expect(response.status).toHaveBeenCalledWith(HttpStatus.TOO_MANY_REQUESTS);
    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({ error: 'RATE_LIMITED', retryAfterSeconds: 420 }),
    );
  });

  it('should pass validation errors through', () => {
    filter.catch(new BadRequestException(['phone should not be empty']), host);

    expect(response.status).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 400,
      message: ['phone should not be empty'],
      error: 'Bad Request',
    });
  });

  it('should hide unexpected errors behind a generic 500', () => {
    filter.catch(new Error('relation "users" does not exist'), host);

    expect(response.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 500,
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred.',
    });
  });
});
