/**
 * Default-track strategy: whatever transcript the API serves without a
 * language argument. No selection logic.
 */

import type { TranscriptApi } from '../api.js';
import { TranscriptFetchError } from '../errors.js';
import type { StrategyRequest, StrategyResult, TranscriptStrategy } from './types.js';

export class DefaultTrackStrategy implements TranscriptStrategy {
  readonly kind = 'default-track' as const;

  constructor(private readonly api: TranscriptApi) {}

  async run(request: StrategyRequest): Promise<StrategyResult> {
    const { language, fragments } = await this.api.fetch(request.videoId, undefined, {
      signal: request.signal,
    });
    const text = fragments.map((f) => f.text).join(' ');
    if (!text.trim()) {
      throw new TranscriptFetchError('Default transcript is empty', 'download');
    }
    return { text, language };
  }
}
