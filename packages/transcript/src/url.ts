/**
 * Extract a YouTube video ID from a URL.
 *
 * Handles:
 *  - youtu.be/ID
 *  - any host containing youtube.com, with the ID in the `v` query parameter
 *
 * Returns `null` when the URL isn't a recognised YouTube link or carries no ID.
 */
export function parseYouTubeVideoId(url: string): string | null {
  let u: URL;
  try {
    u = new URL(url.trim());
  } catch {
    return null;
  }

  const host = u.hostname.toLowerCase();

  if (host === 'youtu.be') {
    const id = u.pathname.slice(1).split('/')[0];
    return id ? id : null;
  }

  if (host.includes('youtube.com')) {
    const v = u.searchParams.get('v');
    return v ? v : null;
  }

  return null;
}

/** Canonical watch-page URL for a video ID. */
export function watchPageUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}
