/** A command that was refused; the session state is unchanged. */
export class CommandRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandRejectedError';
  }
}

/** Internal inconsistency in a session's state. The session is forced to end. */
export class InvariantViolationError extends Error {
  constructor(
    readonly lessonId: string,
    message: string,
  ) {
    super(`Lesson ${lessonId}: ${message}`);
    this.name = 'InvariantViolationError';
  }
}

/** The lesson cannot be started (unknown lesson, or its record is already closed). */
export class LessonUnavailableError extends Error {
  constructor(
    readonly lessonId: string,
    readonly reason: 'not_found' | 'closed',
    message: string,
  ) {
    super(message);
    this.name = 'LessonUnavailableError';
  }
}
