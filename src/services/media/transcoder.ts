import ffmpeg, { FfprobeData } from 'fluent-ffmpeg';
import { logger } from '../../utils/logger';
import { CropRegion } from './crop';
import { SnippetWindow } from './snippet';

export interface ImageSize {
  width: number;
  height: number;
}

/**
 * Media work the quiz hands off to an external tool. Every call may fail
 * (tool missing, unreadable file); callers fall back to the untouched source.
 */
export interface MediaTranscoder {
  probeDuration(filePath: string): Promise<number>;
  probeImageSize(filePath: string): Promise<ImageSize>;
  extractSnippet(inputPath: string, window: SnippetWindow, outputPath: string): Promise<string>;
  cropImage(inputPath: string, region: CropRegion, outputPath: string): Promise<string>;
}

export interface FfmpegOptions {
  ffmpegPath?: string | null;
  ffprobePath?: string | null;
}

/** Loudness target for snippets: -16 LUFS, true peak -1.5 dB */
const LOUDNORM_FILTER = 'loudnorm=I=-16:TP=-1.5:LRA=11';

const probe = (filePath: string): Promise<FfprobeData> =>
  new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err: Error | null, metadata: FfprobeData) => {
      if (err) {
        reject(new Error(`Error probing media file: ${err.message}`));
        return;
      }
      resolve(metadata);
    });
  });

export class FfmpegTranscoder implements MediaTranscoder {
  constructor(options: FfmpegOptions = {}) {
    if (options.ffmpegPath) {
      ffmpeg.setFfmpegPath(options.ffmpegPath);
    }
    if (options.ffprobePath) {
      ffmpeg.setFfprobePath(options.ffprobePath);
    }
  }

  async probeDuration(filePath: string): Promise<number> {
    const metadata = await probe(filePath);
    const duration = metadata.format.duration;
    if (typeof duration !== 'number' || Number.isNaN(duration)) {
      throw new Error('Could not determine media duration');
    }
    return duration;
  }

  async probeImageSize(filePath: string): Promise<ImageSize> {
    const metadata = await probe(filePath);
    const stream = metadata.streams.find(s => s.codec_type === 'video');
    if (!stream?.width || !stream.height) {
      throw new Error('Could not determine image dimensions');
    }
    return { width: stream.width, height: stream.height };
  }

  extractSnippet(inputPath: string, window: SnippetWindow, outputPath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      ffmpeg(inputPath)
        .setStartTime(window.startSeconds)
        .setDuration(window.durationSeconds)
        .noVideo()
        .audioFilters(LOUDNORM_FILTER)
        .audioCodec('libopus')
        .audioBitrate('64k')
        .outputOptions(['-vbr on', '-compression_level 10', '-application voip'])
        .output(outputPath)
        .on('start', (command: string) => logger.ffmpeg(command))
        .on('error', (err: Error) => {
          reject(new Error(`Error creating snippet: ${err.message}`));
        })
        .on('end', () => {
          logger.info(`Created snippet at ${outputPath}`);
          resolve(outputPath);
        })
        .run();
    });
  }

  cropImage(inputPath: string, region: CropRegion, outputPath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      ffmpeg(inputPath)
        .videoFilters(`crop=${region.width}:${region.height}:${region.left}:${region.top}`)
        .outputOptions(['-frames:v 1'])
        .output(outputPath)
        .on('start', (command: string) => logger.ffmpeg(command))
        .on('error', (err: Error) => {
          reject(new Error(`Error cropping image: ${err.message}`));
        })
        .on('end', () => resolve(outputPath))
        .run();
    });
  }
}
