import ffmpeg from 'fluent-ffmpeg';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import ffprobeInstaller from '@ffprobe-installer/ffprobe';
import { spawn } from 'child_process';
import fs from 'fs';
import { z } from 'zod';
import { type MediaToolkit } from '@/types/transcription';
import { logger } from '@/services/utils/logger';

export interface ChunkEncodingOptions {
  format?: 'mp3' | 'wav' | 'flac';
  sampleRate?: number;
  channels?: number;
  bitrate?: string;
}

export interface FfmpegToolkitOptions {
  customFfmpegPath?: string;
  customFfprobePath?: string;
  encoding?: ChunkEncodingOptions;
}

/** Mono 16 kHz, the rate Whisper resamples to */
export const DEFAULT_CHUNK_ENCODING: Required<ChunkEncodingOptions> = {
  format: 'mp3',
  sampleRate: 16000,
  channels: 1,
  bitrate: '64k',
};

const FfprobeFormatSchema = z.object({
  format: z.object({ duration: z.coerce.number().optional() }),
});

function resolveBinaryPath(label: string, custom: string | undefined, bundled: string): string {
  if (custom) {
    if (fs.existsSync(custom)) {
      logger.info(`Using custom ${label} path: ${custom}`);
      return custom;
    }
    logger.warn(`Custom ${label} path not found: ${custom}, using default.`);
  }
  return bundled;
}

/**
 * MediaToolkit backed by ffprobe/ffmpeg through fluent-ffmpeg
 */
export class FfmpegToolkit implements MediaToolkit {
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;
  private readonly encoding: Required<ChunkEncodingOptions>;

  constructor(options: FfmpegToolkitOptions = {}) {
    this.ffmpegPath = resolveBinaryPath('FFmpeg', options.customFfmpegPath, ffmpegInstaller.path);
    this.ffprobePath = resolveBinaryPath(
      'FFprobe',
      options.customFfprobePath,
      ffprobeInstaller.path
    );
    this.encoding = { ...DEFAULT_CHUNK_ENCODING, ...options.encoding };
  }

  get chunkExtension(): string {
    return this.encoding.format;
  }

  /**
   * Container duration in seconds via `ffprobe -show_entries format=duration`.
   * The ffprobe process is killed when the signal aborts.
   */
  probe(filePath: string, signal?: AbortSignal): Promise<number> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const child = spawn(this.ffprobePath, [
        '-v',
        'error',
        '-show_entries',
        'format=duration',
        '-of',
        'json',
        filePath,
      ]);

      let stdout = '';
      let stderr = '';
      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      const onAbort = () => child.kill('SIGKILL');
      signal?.addEventListener('abort', onAbort, { once: true });

      child.on('error', (err) => {
        signal?.removeEventListener('abort', onAbort);
        reject(signal?.aborted ? signal.reason : err);
      });

      child.on('close', (code) => {
        signal?.removeEventListener('abort', onAbort);
        if (signal?.aborted) {
          reject(signal.reason);
          return;
        }
        if (code !== 0) {
          reject(new Error(`FFprobe exited with code ${code}: ${stderr.trim()}`));
          return;
        }
        try {
          const parsed = FfprobeFormatSchema.safeParse(JSON.parse(stdout));
          resolve(parsed.success ? (parsed.data.format.duration ?? Number.NaN) : Number.NaN);
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  extractSegment(
    filePath: string,
    start: number,
    duration: number,
    outPath: string,
    signal?: AbortSignal
  ): Promise<void> {
    const { format, sampleRate, channels, bitrate } = this.encoding;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      let command = ffmpeg(filePath)
        .setFfmpegPath(this.ffmpegPath)
        .setStartTime(start)
        .setDuration(duration)
        .noVideo()
        .audioChannels(channels)
        .audioFrequency(sampleRate)
        .format(format)
        .outputOptions(['-y'])
        .output(outPath);

      if (format === 'mp3') {
        command = command.audioBitrate(bitrate);
      }

      const onAbort = () => command.kill('SIGKILL');
      signal?.addEventListener('abort', onAbort, { once: true });

      command.on('start', (commandLine: string) => {
        logger.debug(`FFmpeg Start: ${commandLine}`);
      });

      command.on('end', () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      });

      command.on('error', (err: Error) => {
        signal?.removeEventListener('abort', onAbort);
        reject(signal?.aborted ? signal.reason : err);
      });

      command.run();
    });
  }
}
