export type QuizErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'PERMISSION'
  | 'TRANSIENT_ASSET';

/**
 * Base class for every failure the quiz reports to a caller.
 * The message is written to be shown to players as-is.
 */
export abstract class QuizError extends Error {
  abstract readonly code: QuizErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad game options; raised before any state is touched. */
export class ValidationError extends QuizError {
  readonly code = 'VALIDATION';

  constructor(message: string, readonly invalidValues: string[] = []) {
    super(message);
  }
}

export class NotFoundError extends QuizError {
  readonly code = 'NOT_FOUND';
}

/** The channel already has a game running or being created. */
export class ConflictError extends QuizError {
  readonly code = 'CONFLICT';
}

export class PermissionError extends QuizError {
  readonly code = 'PERMISSION';
}

/** Media lookup or transcoding failed; never fatal to a session. */
export class TransientAssetError extends QuizError {
  readonly code = 'TRANSIENT_ASSET';
}

export const isQuizError = (error: unknown): error is QuizError => error instanceof QuizError;
