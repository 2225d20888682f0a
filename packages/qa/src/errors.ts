/**
 * @tubeqa/qa - Error types
 */

export class QaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QaError';
  }
}

/** The extracted transcript is too short to answer anything from. */
export class InsufficientTranscriptError extends QaError {
  constructor(
    public readonly length: number,
    public readonly minLength: number,
  ) {
    super(
      `Transcript too short or empty (${length} characters, need at least ${minLength}). Try a different video or language.`,
    );
    this.name = 'InsufficientTranscriptError';
  }
}

/** A question was asked before a video was processed. */
export class SessionNotReadyError extends QaError {
  constructor() {
    super('No video processed yet. Process a video before asking questions.');
    this.name = 'SessionNotReadyError';
  }
}
