export type TransitionErrorCode =
  | 'NotFound'
  | 'InvalidTransition'
  | 'InsufficientCapacity'
  | 'NoMatch'
  | 'MissingSlotAssignment';

export type AdminErrorCode = 'SlotInUse';

export type ErrorCode = TransitionErrorCode | AdminErrorCode;

interface HttpError {
  code: string;
  statusCode: number;
}

// wire codes stay snake_case, same as request validation errors
const HTTP_ERRORS: Record<ErrorCode, HttpError> = {
  NotFound: { code: 'not_found', statusCode: 404 },
  InvalidTransition: { code: 'invalid_transition', statusCode: 409 },
  InsufficientCapacity: { code: 'insufficient_capacity', statusCode: 409 },
  NoMatch: { code: 'no_match', statusCode: 409 },
  MissingSlotAssignment: { code: 'missing_slot_assignment', statusCode: 422 },
  SlotInUse: { code: 'slot_in_use', statusCode: 409 },
};

export function toHttpError(code: ErrorCode): HttpError {
  return HTTP_ERRORS[code];
}
