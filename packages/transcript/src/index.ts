/**
 * @tubeqa/transcript - Transcript acquisition
 *
 * URL resolution, the three caption strategies, the orchestrator that chains
 * them and the error taxonomy they report through.
 */

// Orchestrator
export {
  TranscriptExtractor,
  extractTranscript,
  type Transcript,
  type TranscriptExtractorOptions,
} from './orchestrator.js';

// Strategies
export { StructuredApiStrategy, candidateLanguages } from './strategies/structured-api.js';
export type { StructuredApiStrategyOptions } from './strategies/structured-api.js';
export { PageScrapeStrategy, DEFAULT_USER_AGENT } from './strategies/page-scrape.js';
export type { PageScrapeStrategyOptions } from './strategies/page-scrape.js';
export { DefaultTrackStrategy } from './strategies/default-track.js';
export type {
  FetchFn,
  StrategyKind,
  StrategyRequest,
  StrategyResult,
  TranscriptStrategy,
} from './strategies/types.js';

// Caption API
export { YoutubeTranscriptPlusApi } from './api.js';
export type {
  ApiCallOptions,
  CaptionFragment,
  FetchedCaptions,
  TranscriptApi,
  YoutubeTranscriptPlusApiOptions,
} from './api.js';

// Parsing
export { parseYouTubeVideoId, watchPageUrl } from './url.js';
export { parseCaptionXml, captionXmlToText, decodeEntities } from './caption-xml.js';
export {
  findCaptionTracks,
  extractCaptionUrls,
  unescapeCaptionUrl,
  type CaptionTrack,
} from './caption-tracks.js';

// Errors
export {
  TranscriptError,
  InvalidVideoUrlError,
  NoTranscriptsError,
  TranscriptFetchError,
  CaptionParseError,
  TranscriptExhaustedError,
  NoCaptionsError,
  type FetchStage,
} from './errors.js';
export { describeFailure, type FailureDescription, type FailureFamily } from './failure.js';

