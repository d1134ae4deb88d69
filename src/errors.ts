// =============================================================================
// CASE EVALUATION — Error Taxonomy
//
// Every validation and policy failure surfaces as an EvaluationError.
// The HTTP layer maps the code to a status; nothing is retried here.
// =============================================================================

export type EvaluationErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'CONFLICT'
  | 'FORBIDDEN'
  | 'INVALID_ARGUMENT'
  | 'INVALID_STATE'
  | 'UNAUTHENTICATED';

export const HTTP_STATUS_BY_CODE: Record<EvaluationErrorCode, number> = {
  NOT_FOUND:        404,
  ALREADY_EXISTS:   409,
  CONFLICT:         409,
  FORBIDDEN:        403,
  INVALID_ARGUMENT: 400,
  INVALID_STATE:    409,
  UNAUTHENTICATED:  401,
};

export class EvaluationError extends Error {
  readonly code: EvaluationErrorCode;

  constructor(code: EvaluationErrorCode, message: string) {
    super(message);
    this.name = 'EvaluationError';
    this.code = code;
  }

  get httpStatus(): number {
    return HTTP_STATUS_BY_CODE[this.code];
  }
}

export const notFound = (message: string) => new EvaluationError('NOT_FOUND', message);
export const alreadyExists = (message: string) => new EvaluationError('ALREADY_EXISTS', message);
export const conflict = (message: string) => new EvaluationError('CONFLICT', message);
export const invalidArgument = (message: string) => new EvaluationError('INVALID_ARGUMENT', message);
export const invalidState = (message: string) => new EvaluationError('INVALID_STATE', message);

/**
 * Policy denial. The message never says whether the resource exists,
 * so an absent record and a hidden one read alike.
 */
export const forbidden = (message = 'Operation not permitted') =>
  new EvaluationError('FORBIDDEN', message);

export function isEvaluationError(
  err: unknown,
  code?: EvaluationErrorCode
): err is EvaluationError {
  return err instanceof EvaluationError && (code === undefined || err.code === code);
}
