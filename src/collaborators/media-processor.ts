import { execFile } from 'node:child_process';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { AudioLevel, Scene, TechnicalMetadata } from '../shared/types.js';
import type { MediaHandle, MediaProcessor, ThumbnailImage } from './types.js';

const execFileAsync = promisify(execFile);

export interface FfmpegConfig {
  ffmpegPath: string;
  ffprobePath: string;
  /** Per-invocation timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Output parsers
// ---------------------------------------------------------------------------

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        r_frame_rate: z.string().optional(),
      }),
    )
    .default([]),
  format: z
    .object({
      duration: z.string().optional(),
      size: z.string().optional(),
    })
    .default({}),
});

function toNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export function parseFrameRate(value: string | undefined): number | null {
  if (!value) return null;
  const [num, den] = value.split('/').map(Number);
  if (num === undefined || !Number.isFinite(num)) return null;
  if (den === undefined) return num;
  if (!Number.isFinite(den) || den === 0) return null;
  return Math.round((num / den) * 100) / 100;
}

export function parseProbeOutput(raw: unknown): TechnicalMetadata {
  const data = probeSchema.parse(raw);
  const video = data.streams.find((s) => s.codec_type === 'video');
  return {
    duration_s: toNumber(data.format.duration),
    width: video?.width ?? null,
    height: video?.height ?? null,
    codec: video?.codec_name ?? null,
    frame_rate: parseFrameRate(video?.r_frame_rate),
    file_size_bytes: toNumber(data.format.size),
  };
}

export function parseVolumeDetect(stderr: string): { mean: number | null; max: number | null } {
  const read = (label: string): number | null => {
    const match = new RegExp(`${label}:\\s*(-?(?:\\d+(?:\\.\\d+)?|inf))\\s*dB`).exec(stderr);
    if (!match?.[1] || match[1] === '-inf' || match[1] === 'inf') return null;
    return Number(match[1]);
  };
  return { mean: read('mean_volume'), max: read('max_volume') };
}

// ---------------------------------------------------------------------------
// ffmpeg-backed processor
// ---------------------------------------------------------------------------

class TempMedia implements MediaHandle {
  constructor(
    private readonly dir: string,
    readonly path: string,
  ) {}

  read(): Promise<Buffer> {
    return readFile(this.path);
  }

  async dispose(): Promise<void> {
    await rm(this.dir, { recursive: true, force: true });
  }
}

async function tempMedia(fileName: string): Promise<TempMedia> {
  const dir = await mkdtemp(path.join(tmpdir(), 'reelgrade-'));
  return new TempMedia(dir, path.join(dir, fileName));
}

export class FfmpegMediaProcessor implements MediaProcessor {
  private readonly timeoutMs: number;

  constructor(private readonly config: FfmpegConfig) {
    this.timeoutMs = config.timeoutMs ?? 60_000;
  }

  async open(bytes: Buffer): Promise<MediaHandle> {
    const media = await tempMedia('input.mp4');
    await writeFile(media.path, bytes);
    return media;
  }

  async trimLeading(media: MediaHandle, seconds: number, signal: AbortSignal): Promise<MediaHandle> {
    const out = await tempMedia('leading.mp4');
    try {
      await this.ffmpeg(['-y', '-i', media.path, '-t', String(seconds), '-c', 'copy', out.path], signal);
      return out;
    } catch (err) {
      await out.dispose();
      throw err;
    }
  }

  async probe(media: MediaHandle, signal: AbortSignal): Promise<TechnicalMetadata> {
    const { stdout } = await execFileAsync(
      this.config.ffprobePath,
      ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', media.path],
      { timeout: this.timeoutMs, signal, maxBuffer: 4 * 1024 * 1024 },
    );
    return parseProbeOutput(JSON.parse(stdout));
  }

  async extractThumbnails(
    media: MediaHandle,
    scenes: readonly Scene[],
    signal: AbortSignal,
  ): Promise<ThumbnailImage[]> {
    const work = await tempMedia('frames');
    try {
      const images: ThumbnailImage[] = [];
      for (const scene of scenes) {
        const midpoint = (scene.start_s + scene.end_s) / 2;
        const framePath = `${work.path}-${scene.index}.jpg`;
        await this.ffmpeg(
          ['-y', '-ss', midpoint.toFixed(2), '-i', media.path, '-frames:v', '1', '-q:v', '3', framePath],
          signal,
        );
        images.push({ scene_index: scene.index, bytes: await readFile(framePath) });
      }
      return images;
    } finally {
      await work.dispose();
    }
  }

  async analyzeAudioLevels(media: MediaHandle, scenes: readonly Scene[], signal: AbortSignal): Promise<AudioLevel[]> {
    const levels: AudioLevel[] = [];
    for (const scene of scenes) {
      const length = Math.max(0.1, scene.end_s - scene.start_s);
      const stderr = await this.ffmpeg(
        ['-ss', scene.start_s.toFixed(2), '-t', length.toFixed(2), '-i', media.path, '-af', 'volumedetect', '-vn', '-f', 'null', '-'],
        signal,
      );
      const { mean, max } = parseVolumeDetect(stderr);
      levels.push({ scene_index: scene.index, mean_volume_db: mean, max_volume_db: max });
    }
    return levels;
  }

  private async ffmpeg(args: string[], signal: AbortSignal): Promise<string> {
    const { stderr } = await execFileAsync(this.config.ffmpegPath, ['-hide_banner', ...args], {
      timeout: this.timeoutMs,
      signal,
      maxBuffer: 4 * 1024 * 1024,
    });
    return stderr;
  }
}
