import { HttpException, HttpStatus } from '@nestjs/common';

export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  REGISTRATION_CLOSED = 'REGISTRATION_CLOSED',
  ALREADY_PARTICIPATED = 'ALREADY_PARTICIPATED',
  RECENT_WINNER = 'RECENT_WINNER',
  DEADLINE_PASSED = 'DEADLINE_PASSED',
  NO_WINNING_TICKET = 'NO_WINNING_TICKET',
  OTP_NOT_FOUND = 'OTP_NOT_FOUND',
  OTP_EXPIRED = 'OTP_EXPIRED',
  OTP_MISMATCH = 'OTP_MISMATCH',
  USER_NOT_FOUND = 'USER_NOT_FOUND',
  USER_ALREADY_EXISTS = 'USER_ALREADY_EXISTS',
  MESSAGE_DELIVERY_FAILED = 'MESSAGE_DELIVERY_FAILED',
}

export type FieldErrors = Record<string, string[]>;

/**
 * Base class for expected business-rule rejections.
 * The response body always carries the machine-readable `error` code.
 */
export class DomainException extends HttpException {
  constructor(
    readonly code: ErrorCode,
    message: string,
    status: HttpStatus,
    readonly details?: FieldErrors,
  ) {
    super(
      { statusCode: status, error: code, message, ...(details ? { details } : {}) },
      status,
    );
  }
}

export class ValidationException extends DomainException {
  constructor(details: FieldErrors) {
    super(ErrorCode.VALIDATION_ERROR, 'Validation failed', HttpStatus.BAD_REQUEST, details);
  }

  static forField(field: string, message: string): ValidationException {
    return new ValidationException({ [field]: [message] });
  }
}

export class RateLimitedException extends DomainException {
  constructor() {
    super(
      ErrorCode.RATE_LIMITED,
      'Too many OTP requests. Please try again later.',
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}

export class RegistrationClosedException extends DomainException {
  constructor() {
    super(
      ErrorCode.REGISTRATION_CLOSED,
      'Registration is closed. It runs from Saturday 08:00 to Wednesday 20:00 (Tehran time).',
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class AlreadyParticipatedException extends DomainException {
  constructor() {
    super(
      ErrorCode.ALREADY_PARTICIPATED,
      'You have already participated this week.',
      HttpStatus.CONFLICT,
    );
  }
}

export class RecentWinnerException extends DomainException {
  constructor() {
    super(
      ErrorCode.RECENT_WINNER,
      'You have won within the last 6 months and cannot participate again yet.',
      HttpStatus.FORBIDDEN,
    );
  }
}

export class DeadlinePassedException extends DomainException {
  constructor() {
    super(
      ErrorCode.DEADLINE_PASSED,
      'The deadline for completing winner information has passed.',
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class NoWinningTicketException extends DomainException {
  constructor() {
    super(ErrorCode.NO_WINNING_TICKET, 'You do not have a winning ticket.', HttpStatus.NOT_FOUND);
  }
}

export class OtpNotFoundException extends DomainException {
  constructor() {
    super(ErrorCode.OTP_NOT_FOUND, 'No active OTP code found.', HttpStatus.BAD_REQUEST);
  }
}

export class OtpExpiredException extends DomainException {
  constructor() {
    super(ErrorCode.OTP_EXPIRED, 'The OTP code has expired.', HttpStatus.BAD_REQUEST);
  }
}

export class OtpMismatchException extends DomainException {
  constructor() {
    super(ErrorCode.OTP_MISMATCH, 'The OTP code is incorrect.', HttpStatus.BAD_REQUEST);
  }
}

export class UserNotFoundException extends DomainException {
  constructor() {
    super(
      ErrorCode.USER_NOT_FOUND,
      'User with this phone number does not exist.',
      HttpStatus.NOT_FOUND,
    );
  }
}

export class UserAlreadyExistsException extends DomainException {
  constructor() {
    super(
      ErrorCode.USER_ALREADY_EXISTS,
      'User with this phone number already exists.',
      HttpStatus.CONFLICT,
    );
  }
}

export class MessageDeliveryException extends DomainException {
  constructor(reason: string) {
    super(
      ErrorCode.MESSAGE_DELIVERY_FAILED,
      `Failed to send message: ${reason}`,
      HttpStatus.BAD_GATEWAY,
    );
  }
}
