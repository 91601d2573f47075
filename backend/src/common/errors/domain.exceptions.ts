import { HttpException, HttpStatus } from '@nestjs/common';
import { ErrorCode } from '@event-hub/shared';

/**
 * Base class for business-rule failures. The `code` is serialized next to
 * the message so clients can branch without parsing text.
 */
export class DomainException extends HttpException {
  constructor(
    readonly code: ErrorCode,
    message: string,
    status: HttpStatus,
  ) {
    super({ statusCode: status, code, message }, status);
  }
}

/** A state-machine guard rejected the requested transition */
export class InvalidTransitionException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.INVALID_TRANSITION, message, HttpStatus.CONFLICT);
  }
}

export class EmptyCartException extends DomainException {
  constructor() {
    super(ErrorCode.EMPTY_CART, 'Cannot create an order from an empty cart', HttpStatus.BAD_REQUEST);
  }
}

/** A cart entry references an item that is no longer orderable */
export class ItemUnavailableException extends DomainException {
  constructor(itemName: string) {
    super(
      ErrorCode.ITEM_UNAVAILABLE,
      `Item "${itemName}" is no longer available`,
      HttpStatus.CONFLICT,
    );
  }
}

export class EmailTakenException extends DomainException {
  constructor() {
    super(ErrorCode.EMAIL_TAKEN, 'Email already registered', HttpStatus.CONFLICT);
  }
}
