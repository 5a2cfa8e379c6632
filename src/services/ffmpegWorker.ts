import { spawn } from 'child_process';

import type { ConversionParameters } from '../types/task';
import { logger } from '../utils/logger';
import { lookupByName } from './outputEstimator';
import type { ConversionJob, ConversionWorker } from './conversionRunner';

export interface FfmpegWorkerOptions {
  ffmpegPath?: string;
}

export interface ProgressState {
  durationSeconds?: number;
  outTimeSeconds?: number;
  speed?: number;
  ended: boolean;
}

const DEFAULT_FFMPEG_PATH = 'ffmpeg';

const RESOLUTION_HEIGHTS: Record<string, number> = {
  '2160p': 2160,
  '4k': 2160,
  '1440p': 1440,
  '1080p': 1080,
  '720p': 720,
  '480p': 480,
  '360p': 360,
  '240p': 240
};

const QUALITY_PRESETS: Record<string, string> = {
  low: 'veryfast',
  fast: 'veryfast',
  medium: 'medium',
  balanced: 'medium',
  high: 'slow',
  slow: 'slow',
  ultra: 'veryslow',
  veryslow: 'veryslow'
};

export function buildFfmpegArgs(sourcePath: string, outputPath: string, parameters: ConversionParameters): string[] {
  const args = ['-hide_banner', '-nostdin', '-y', '-i', sourcePath];

  if (parameters.videoCodec) {
    args.push('-c:v', parameters.videoCodec);
  }
  if (parameters.audioCodec) {
    args.push('-c:a', parameters.audioCodec);
  }
  if (parameters.videoBitrate && parameters.videoBitrate > 0) {
    args.push('-b:v', `${parameters.videoBitrate}k`);
  }
  if (parameters.audioBitrate && parameters.audioBitrate > 0) {
    args.push('-b:a', `${parameters.audioBitrate}k`);
  }

  const height = lookupByName(RESOLUTION_HEIGHTS, parameters.resolution);
  if (height) {
    args.push('-vf', `scale=-2:${height}`);
  }

  const preset = lookupByName(QUALITY_PRESETS, parameters.quality);
  if (preset) {
    args.push('-preset', preset);
  }

  args.push('-progress', 'pipe:1', '-nostats', outputPath);
  return args;
}

/** Parses `HH:MM:SS.ms` into seconds. */
export function parseTimestamp(value: string): number | undefined {
  const match = /^(\d+):(\d{2}):(\d{2}(?:\.\d+)?)$/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
}

export function parseDuration(stderrChunk: string): number | undefined {
  const match = /Duration:\s*(\d+:\d{2}:\d{2}(?:\.\d+)?)/.exec(stderrChunk);
  return match ? parseTimestamp(match[1]) : undefined;
}

/** Folds one `key=value` line of `-progress` output into the state. */
export function applyProgressLine(state: ProgressState, line: string): ProgressState {
  const separator = line.indexOf('=');
  if (separator < 0) {
    return state;
  }

  const key = line.slice(0, separator).trim();
  const value = line.slice(separator + 1).trim();
  switch (key) {
    case 'out_time_us':
    case 'out_time_ms': {
      // ffmpeg reports both keys in microseconds.
      const micros = Number(value);
      return Number.isFinite(micros) && micros >= 0 ? { ...state, outTimeSeconds: micros / 1_000_000 } : state;
    }
    case 'speed': {
      const speed = Number.parseFloat(value.replace(/x$/, ''));
      return Number.isFinite(speed) ? { ...state, speed } : state;
    }
    case 'progress':
      return { ...state, ended: value === 'end' };
    default:
      return state;
  }
}

export function toWorkerProgress(state: ProgressState): { progress: number; speed?: number; eta?: number } | undefined {
  if (!state.durationSeconds || state.outTimeSeconds === undefined) {
    return undefined;
  }

  const ratio = Math.min(1, state.outTimeSeconds / state.durationSeconds);
  const progress = state.ended ? 100 : Math.min(99, Math.floor(ratio * 100));
  const remaining = Math.max(0, state.durationSeconds - state.outTimeSeconds);
  const eta = state.speed && state.speed > 0 ? Math.round(remaining / state.speed) : undefined;

  return { progress, speed: state.speed, eta };
}

/** Runs ffmpeg as the external worker and turns its progress stream into reports. */
export class FfmpegWorker implements ConversionWorker {
  private readonly ffmpegPath: string;

  constructor(options: FfmpegWorkerOptions = {}) {
    this.ffmpegPath = options.ffmpegPath?.trim() || DEFAULT_FFMPEG_PATH;
  }

  getExecutablePath(): string {
    return this.ffmpegPath;
  }

  run(job: ConversionJob): Promise<void> {
    const args = buildFfmpegArgs(job.task.source.path, job.outputPath, job.task.parameters);
    logger.debug('worker', `Executing ${this.ffmpegPath} ${args.join(' ')}`);

    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.ffmpegPath, args);
      let state: ProgressState = { ended: false };
      let lastProgress = -1;
      let stdoutBuffer = '';
      let stderrTail = '';

      const onAbort = () => {
        child.kill('SIGTERM');
      };
      job.signal.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutBuffer += chunk.toString();
        const lines = stdoutBuffer.split(/\r?\n/);
        stdoutBuffer = lines.pop() ?? '';
        for (const line of lines) {
          state = applyProgressLine(state, line);
        }

        const report = toWorkerProgress(state);
        if (report && report.progress !== lastProgress) {
          lastProgress = report.progress;
          job.report(report);
        }
      });

      child.stderr.on('data', (chunk: Buffer) => {
        const text = chunk.toString();
        stderrTail = (stderrTail + text).slice(-4_000);
        if (state.durationSeconds === undefined) {
          const duration = parseDuration(text);
          if (duration !== undefined) {
            state = { ...state, durationSeconds: duration };
          }
        }
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        job.signal.removeEventListener('abort', onAbort);
        if (error.code === 'ENOENT') {
          reject(new Error(`ffmpeg executable not found at "${this.ffmpegPath}". Set FFMPEG_PATH if necessary.`));
          return;
        }
        reject(error);
      });

      child.on('close', (code: number | null) => {
        job.signal.removeEventListener('abort', onAbort);
        if (job.signal.aborted) {
          reject(new Error('Conversion aborted.'));
        } else if (code === 0) {
          resolve();
        } else {
          const lastLine = stderrTail.trim().split(/\r?\n/).pop();
          reject(new Error(lastLine || `ffmpeg exited with code ${code}`));
        }
      });
    });
  }
}
