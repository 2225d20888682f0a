/**
 * @tubeqa/qa - Question answering over a transcript
 */

export { QA_PROMPT_TEMPLATE, fillPromptTemplate, formatContext } from './prompt.js';
export type { CompletionModel, CompletionOptions } from './completion.js';
export {
  RetrievalQaPipeline,
  DEFAULT_RETRIEVAL,
  type PipelineDependencies,
  type AnswerResult,
} from './pipeline.js';
export {
  TranscriptQaSession,
  type TranscriptQaSessionOptions,
  type TranscriptSource,
  type ChatTurn,
  type ProcessedVideo,
} from './session.js';
export { QaError, InsufficientTranscriptError, SessionNotReadyError } from './errors.js';
