import { describeCause, EmptyTranscriptError, NoCaptionMetadataError, NoTranscriptAvailableError } from './errors';
import { debug, info, startStep, warn } from './log';
import type { AttemptFailure, CaptionFragment, CaptionProvider, CaptionTrack, Transcript } from './types';

export const ANY_LANGUAGE = 'any';

export interface AcquireOptions {
    // Tried in order; any other listed track is tried after all of them fail
    languages: string[];
}

export function joinFragments(fragments: CaptionFragment[]): string {
    return fragments.map((f) => f.text).join(' ');
}

/**
 * Fetches caption text for a video, walking a fixed language priority list
 * before taking any other listed track. Only languages the listing offers are
 * fetched. This ordered fallback is the only retry in the pipeline.
 */
export class TranscriptAcquirer {
    private readonly provider: CaptionProvider;
    private readonly opts: AcquireOptions;

    constructor(provider: CaptionProvider, opts: AcquireOptions) {
        this.provider = provider;
        this.opts = opts;
    }

    async acquire(videoId: string): Promise<Transcript> {
        const step = startStep('transcript.acquire', { videoId });

        let available: CaptionTrack[];
        try {
            available = await this.provider.listTracks(videoId);
        } catch (e) {
            warn('transcript.list.fail', { videoId, error: describeCause(e) });
            throw new NoCaptionMetadataError(videoId, e);
        }
        debug('transcript.list', { videoId, tracks: available.map((t) => `${t.language}:${t.kind}`) });

        const failures: AttemptFailure[] = [];
        const tried = new Set<CaptionTrack>();
        let lastError: unknown;

        const attempt = async (track: CaptionTrack): Promise<CaptionFragment[] | null> => {
            tried.add(track);
            try {
                return await this.provider.fetchTrack(videoId, track);
            } catch (e) {
                lastError = e;
                failures.push({ language: track.language, message: describeCause(e) });
                debug('transcript.lang.fail', { videoId, language: track.language, error: describeCause(e) });
                return null;
            }
        };

        let fragments: CaptionFragment[] | null = null;
        let chosen: CaptionTrack | undefined;
        for (const language of this.opts.languages) {
            const track = available.find((t) => t.language === language);
            if (!track) {
                failures.push({ language, message: `No ${language} captions listed` });
                continue;
            }
            fragments = await attempt(track);
            if (fragments) {
                chosen = track;
                break;
            }
        }

        if (!fragments) {
            const fallback = available.find((t) => !tried.has(t));
            if (fallback) {
                fragments = await attempt(fallback);
                if (fragments) chosen = fallback;
            } else {
                failures.push({ language: ANY_LANGUAGE, message: 'No other captions listed' });
            }
        }

        if (!fragments || !chosen) {
            warn('transcript.unavailable', { videoId, attempts: failures.length });
            throw new NoTranscriptAvailableError(videoId, { available, attempts: failures }, lastError);
        }

        const text = joinFragments(fragments);
        if (!text.trim()) {
            throw new EmptyTranscriptError(videoId);
        }

        const language = chosen.language;
        step.end({ language, kind: chosen.kind, fragments: fragments.length, chars: text.length });
        info('transcript.acquired', { videoId, language, chars: text.length, skipped: failures.length });
        return { videoId, language, text };
    }
}
