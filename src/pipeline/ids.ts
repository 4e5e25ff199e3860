import { InvalidReferenceError } from './errors';

const SHORT_LINK_MARKER = 'youtu.be';
const CANONICAL_MARKER = 'youtube.com';

function parseUrl(reference: string): URL | null {
  for (const candidate of [reference, `https://${reference}`]) {
    if (URL.canParse(candidate)) return new URL(candidate);
  }
  return null;
}

/**
 * Extracts the YouTube video ID from a share link, watch page or embed URL.
 * Throws InvalidReferenceError for anything else.
 */
export function resolveVideoId(reference: string): string {
  const ref = reference.trim();
  let id: string | null = null;

  if (ref.includes(SHORT_LINK_MARKER)) {
    const last = ref.split('/').pop() ?? '';
    id = last.split('?')[0];
  } else if (ref.includes(CANONICAL_MARKER)) {
    const url = parseUrl(ref);
    if (url?.pathname === '/watch') {
      id = url.searchParams.get('v');
    } else if (url?.pathname.startsWith('/embed/')) {
      id = url.pathname.split('/')[2] ?? null;
    }
  }

  if (!id) throw new InvalidReferenceError(reference);
  return id;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}
