import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { watchUrl } from './ids';
import { debug, warn } from './log';
import type { CaptionFragment, CaptionProvider, CaptionTrack } from './types';

export interface YtDlpOptions {
    artifactsRoot: string;
    bin?: string;
    // Interpreter with yt_dlp installed, tried after the binaries
    pythonBin?: string;
    cookiesFile?: string;
    userAgent?: string;
    extraArgs?: string;
    timeoutMs?: number;
}

const TrackEntry = z.object({ ext: z.string().optional(), name: z.string().optional(), url: z.string().optional() });
const TrackMap = z.record(z.array(TrackEntry)).nullish();

const Listing = z.object({
    subtitles: TrackMap,
    automatic_captions: TrackMap,
});

const Json3 = z.object({
    events: z
        .array(
            z.object({
                tStartMs: z.number().optional(),
                dDurationMs: z.number().optional(),
                segs: z.array(z.object({ utf8: z.string().optional() })).optional(),
            })
        )
        .default([]),
});

// Chat replays show up as a subtitle track but are not captions
const IGNORED_TRACKS = new Set(['live_chat']);
// Auto captions in the spoken language are also listed as "<lang>-orig"
const ORIGINAL_SUFFIX = '-orig';

// Machine translations of the auto captions carry a target language in their URL
function isTranslation(entry: z.infer<typeof TrackEntry>): boolean {
    return entry.url?.includes('tlang=') ?? false;
}

/**
 * Reads caption tracks out of `yt-dlp -J` metadata. Manual tracks come first;
 * auto-generated tracks follow for languages without a manual one.
 * Machine-translated auto tracks are left out.
 */
export function parseTrackListing(metadata: unknown): CaptionTrack[] {
    const parsed = Listing.parse(metadata);
    const tracks: CaptionTrack[] = [];
    const seen = new Set<string>();
    const add = (map: Record<string, z.infer<typeof TrackEntry>[]> | null | undefined, kind: CaptionTrack['kind']) => {
        for (const [code, entries] of Object.entries(map ?? {})) {
            const native = entries.filter((e) => !isTranslation(e));
            if (IGNORED_TRACKS.has(code) || native.length === 0) continue;
            const language = code.endsWith(ORIGINAL_SUFFIX) ? code.slice(0, -ORIGINAL_SUFFIX.length) : code;
            if (seen.has(language)) continue;
            seen.add(language);
            const track: CaptionTrack = { language, kind };
            const name = native.find((e) => e.name)?.name;
            if (name) track.name = name;
            if (code !== language) track.code = code;
            tracks.push(track);
        }
    };
    add(parsed.subtitles, 'manual');
    add(parsed.automatic_captions, 'auto');
    return tracks;
}

/** Converts YouTube's json3 caption format into fragments, dropping blank events. */
export function parseJson3(data: unknown): CaptionFragment[] {
    const { events } = Json3.parse(data);
    const fragments: CaptionFragment[] = [];
    for (const ev of events) {
        const text = (ev.segs ?? [])
            .map((s) => s.utf8 ?? '')
            .join('')
            .replace(/\s+/g, ' ')
            .trim();
        if (!text) continue;
        fragments.push({ text, startMs: ev.tStartMs ?? 0, durationMs: ev.dDurationMs ?? 0 });
    }
    return fragments;
}

function execErrorMessage(e: unknown): string {
    if (e instanceof Error) {
        const stderr = 'stderr' in e && typeof e.stderr === 'string' ? e.stderr.trim() : '';
        return stderr || e.message;
    }
    return String(e);
}

export class YtDlpCaptionProvider implements CaptionProvider {
    private readonly opts: YtDlpOptions;

    constructor(opts: YtDlpOptions) {
        this.opts = opts;
    }

    private extraArgs(): string[] {
        const extra: string[] = [];
        if (this.opts.cookiesFile) extra.push('--cookies', this.opts.cookiesFile);
        if (this.opts.userAgent) extra.push('--user-agent', this.opts.userAgent);
        if (this.opts.extraArgs) {
            extra.push(
                ...this.opts.extraArgs
                    .split(' ')
                    .map((s) => s.trim())
                    .filter(Boolean)
            );
        }
        return extra;
    }

    private candidates(args: string[]): Array<[string, string[]]> {
        const bin = this.opts.bin || 'yt-dlp';
        const attempts: Array<[string, string[]]> = [[bin, args]];
        if (bin !== 'yt-dlp') attempts.push(['yt-dlp', args]);
        if (this.opts.pythonBin) attempts.push([this.opts.pythonBin, ['-m', 'yt_dlp', ...args]]);
        attempts.push(['python3', ['-m', 'yt_dlp', ...args]]);
        return attempts;
    }

    /** Runs yt-dlp through each candidate until one exits cleanly; returns stdout. */
    private async run(args: string[]): Promise<string> {
        const errors: string[] = [];
        for (const [cmd, a] of this.candidates(args)) {
            try {
                const res = await execa(cmd, a, { stdio: 'pipe', timeout: this.opts.timeoutMs });
                return res.stdout;
            } catch (e) {
                const msg = execErrorMessage(e);
                debug('captions.ytdlp.attempt.fail', { cmd, error: msg });
                errors.push(`[${cmd}] ${msg}`);
            }
        }
        throw new Error(`All yt-dlp attempts failed. Errors:\n${errors.join('\n---\n')}`);
    }

    async listTracks(videoId: string): Promise<CaptionTrack[]> {
        const stdout = await this.run(['-J', '--skip-download', ...this.extraArgs(), watchUrl(videoId)]);
        return parseTrackListing(JSON.parse(stdout));
    }

    async fetchTrack(videoId: string, track: CaptionTrack): Promise<CaptionFragment[]> {
        const code = track.code ?? track.language;
        const videoDir = path.resolve(this.opts.artifactsRoot, videoId);
        await fs.ensureDir(videoDir);
        // Each fetch writes into its own directory so concurrent requests for a video never share files
        const scratch = await fs.mkdtemp(path.join(videoDir, 'fetch-'));
        try {
            await this.run([
                '--skip-download',
                track.kind === 'manual' ? '--write-subs' : '--write-auto-subs',
                '--sub-langs',
                code,
                '--sub-format',
                'json3',
                '-o',
                path.join(scratch, `${videoId}.%(ext)s`),
                ...this.extraArgs(),
                watchUrl(videoId),
            ]);

            // yt-dlp names subtitle files <output>.<lang>.<ext>
            const produced = path.join(scratch, `${videoId}.${code}.json3`);
            if (!(await fs.pathExists(produced))) {
                throw new Error(`No '${code}' captions were written for ${videoId}`);
            }
            return parseJson3(await fs.readJson(produced));
        } finally {
            await fs.remove(scratch).catch((e: unknown) => {
                warn('captions.cleanup.fail', { dir: scratch, error: execErrorMessage(e) });
            });
        }
    }
}
