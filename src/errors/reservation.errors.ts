import { HttpException, HttpStatus } from '@nestjs/common';

export enum ReservationErrorCode {
  INVALID_REQUEST = 'INVALID_REQUEST',
  INVALID_SEAT = 'INVALID_SEAT',
  SEAT_UNAVAILABLE = 'SEAT_UNAVAILABLE',
  INSUFFICIENT_INVENTORY = 'INSUFFICIENT_INVENTORY',
  HOLD_NOT_FOUND = 'HOLD_NOT_FOUND',
  HOLD_EXPIRED = 'HOLD_EXPIRED',
  HOLD_ALREADY_CONVERTED = 'HOLD_ALREADY_CONVERTED',
  HOLD_NOT_ACTIVE = 'HOLD_NOT_ACTIVE',
  SEAT_STATE_MISMATCH = 'SEAT_STATE_MISMATCH',
  PURCHASE_NOT_FOUND = 'PURCHASE_NOT_FOUND',
  PURCHASE_ALREADY_CANCELLED = 'PURCHASE_ALREADY_CANCELLED',
  PURCHASE_NOT_ACTIVE = 'PURCHASE_NOT_ACTIVE',
  UNKNOWN_FLIGHT = 'UNKNOWN_FLIGHT',
  FLIGHT_ALREADY_EXISTS = 'FLIGHT_ALREADY_EXISTS',
}

export interface ReservationErrorBody {
  statusCode: number;
  error: ReservationErrorCode;
  message: string;
  details: Record<string, unknown>;
}

/**
 * Base class for every domain failure. Rendered by Nest's exception layer as
 * `{ statusCode, error, message, details }`.
 */
export abstract class ReservationException extends HttpException {
  protected constructor(
    readonly code: ReservationErrorCode,
    message: string,
    status: HttpStatus,
    readonly details: Record<string, unknown> = {},
  ) {
    super({ statusCode: status, error: code, message, details } satisfies ReservationErrorBody, status);
  }
}

export class InvalidRequestException extends ReservationException {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ReservationErrorCode.INVALID_REQUEST, message, HttpStatus.BAD_REQUEST, details);
  }
}

export class UnknownFlightException extends ReservationException {
  constructor(flightId: string) {
    super(ReservationErrorCode.UNKNOWN_FLIGHT, `Unknown flight: ${flightId}`, HttpStatus.NOT_FOUND, { flightId });
  }
}

export class FlightAlreadyExistsException extends ReservationException {
  constructor(flightId: string) {
    super(ReservationErrorCode.FLIGHT_ALREADY_EXISTS, `Flight already exists: ${flightId}`, HttpStatus.CONFLICT, {
      flightId,
    });
  }
}

export class InvalidSeatException extends ReservationException {
  constructor(flightId: string, seat: string) {
    super(ReservationErrorCode.INVALID_SEAT, `Invalid seat for flight ${flightId}: ${seat}`, HttpStatus.BAD_REQUEST, {
      flightId,
      seat,
    });
  }
}

export class SeatUnavailableException extends ReservationException {
  constructor(seat: string, status: string) {
    super(ReservationErrorCode.SEAT_UNAVAILABLE, `Seat not available: ${seat} (status=${status})`, HttpStatus.CONFLICT, {
      seat,
      status,
    });
  }
}

export class InsufficientInventoryException extends ReservationException {
  constructor(requested: number, available: number) {
    super(
      ReservationErrorCode.INSUFFICIENT_INVENTORY,
      `Not enough available seats. Requested=${requested}, available=${available}`,
      HttpStatus.CONFLICT,
      { requested, available },
    );
  }
}

export class SeatStateMismatchException extends ReservationException {
  constructor(seat: string, expected: string, actual: string | undefined) {
    super(
      ReservationErrorCode.SEAT_STATE_MISMATCH,
      `Seat state mismatch for ${seat}. Expected ${expected}, found ${actual ?? 'nothing'}`,
      HttpStatus.CONFLICT,
      { seat, expected, actual: actual ?? null },
    );
  }
}

export class HoldNotFoundException extends ReservationException {
  constructor(holdId: string) {
    super(ReservationErrorCode.HOLD_NOT_FOUND, `Unknown hold: ${holdId}`, HttpStatus.NOT_FOUND, { holdId });
  }
}

export class HoldExpiredException extends ReservationException {
  constructor(holdId: string) {
    super(ReservationErrorCode.HOLD_EXPIRED, `Hold ${holdId} is expired; cannot purchase`, HttpStatus.GONE, {
      holdId,
    });
  }
}

export class HoldAlreadyConvertedException extends ReservationException {
  constructor(holdId: string) {
    super(
      ReservationErrorCode.HOLD_ALREADY_CONVERTED,
      `Hold ${holdId} already converted to a purchase`,
      HttpStatus.CONFLICT,
      { holdId },
    );
  }
}

export class HoldNotActiveException extends ReservationException {
  constructor(holdId: string, status: string) {
    super(ReservationErrorCode.HOLD_NOT_ACTIVE, `Hold ${holdId} not ACTIVE (status=${status})`, HttpStatus.CONFLICT, {
      holdId,
      status,
    });
  }
}

export class PurchaseNotFoundException extends ReservationException {
  constructor(purchaseId: string) {
    super(ReservationErrorCode.PURCHASE_NOT_FOUND, `Unknown purchase: ${purchaseId}`, HttpStatus.NOT_FOUND, {
      purchaseId,
    });
  }
}

export class PurchaseAlreadyCancelledException extends ReservationException {
  constructor(purchaseId: string) {
    super(
      ReservationErrorCode.PURCHASE_ALREADY_CANCELLED,
      `Purchase ${purchaseId} already cancelled`,
      HttpStatus.CONFLICT,
      { purchaseId },
    );
  }
}

export class PurchaseNotActiveException extends ReservationException {
  constructor(purchaseId: string, status: string) {
    super(
      ReservationErrorCode.PURCHASE_NOT_ACTIVE,
      `Purchase ${purchaseId} not ACTIVE (status=${status})`,
      HttpStatus.CONFLICT,
      { purchaseId, status },
    );
  }
}
