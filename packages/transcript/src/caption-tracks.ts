/**
 * Locating caption tracks inside a watch page.
 */

export interface CaptionTrack {
  /** Language from the track URL's `lang` parameter, when present. */
  languageCode: string | null;
  baseUrl: string;
}

const MARKER = '"captionTracks":';

/**
 * Return the raw `"captionTracks":[...]` array text embedded in the page,
 * or null when the marker is absent. Brackets inside JSON strings are
 * ignored. An unterminated array runs to the end of the document.
 */
export function findCaptionTracks(html: string): string | null {
  const markerAt = html.indexOf(MARKER);
  if (markerAt === -1) return null;

  const start = html.indexOf('[', markerAt + MARKER.length);
  if (start === -1) return html.slice(markerAt + MARKER.length);

  let depth = 0;
  let inString = false;

  for (let i = start; i < html.length; i++) {
    const ch = html[i];

    if (inString) {
      if (ch === '\\') {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '[') {
      depth++;
    } else if (ch === ']') {
      depth--;
      if (depth === 0) return html.slice(start, i + 1);
    }
  }

  return html.slice(start);
}

/** Undo the JSON escaping applied to URLs embedded in the page. */
export function unescapeCaptionUrl(raw: string): string {
  return raw.replace(/\\u0026/g, '&').replace(/\\/g, '');
}

function languageOf(url: string): string | null {
  try {
    return new URL(url).searchParams.get('lang');
  } catch {
    return null;
  }
}

/** Pull every `baseUrl` out of a caption-tracks array, in order. */
export function extractCaptionUrls(tracks: string): CaptionTrack[] {
  const result: CaptionTrack[] = [];
  for (const match of tracks.matchAll(/"baseUrl":"(.*?)"/g)) {
    const baseUrl = unescapeCaptionUrl(match[1] ?? '');
    result.push({ languageCode: languageOf(baseUrl), baseUrl });
  }
  return result;
}
