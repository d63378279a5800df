import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { AssetLocator } from '../../catalog/assetLocator';
import { MediaMode, SongRecord } from '../../catalog/types';
import { ImageDifficulty } from '../../game/options';
import { TransientAssetError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { computeCropRegion, CropRegion } from './crop';
import { computeSnippetWindow, SnippetWindow } from './snippet';
import { MediaTranscoder } from './transcoder';

export type ClueMedia =
  | {
    kind: 'image';
    path: string;
    sourcePath: string;
    /** Null when the full cover is shown */
    crop: CropRegion | null;
    /** True when the file was generated for this round and should be deleted after use */
    temporary: boolean;
  }
  | {
    kind: 'audio';
    path: string;
    sourcePath: string;
    /** Null when the untrimmed source is delivered */
    window: SnippetWindow | null;
    temporary: boolean;
  };

export interface ClueRequest {
  channelId: string;
  song: SongRecord;
  mode: MediaMode;
  imageDifficulty: ImageDifficulty;
  snippetLengthSeconds: number;
}

/** Produces round media. Implementations resolve to null instead of throwing. */
export interface CluePreparer {
  prepare(request: ClueRequest): Promise<ClueMedia | null>;
}

export class ClueMediaPreparer implements CluePreparer {
  constructor(
    private readonly assets: AssetLocator,
    private readonly transcoder: MediaTranscoder | null,
    private readonly workDir: string,
    private readonly random: () => number = Math.random
  ) {}

  async prepare(request: ClueRequest): Promise<ClueMedia | null> {
    try {
      return request.mode === 'image'
        ? await this.prepareImage(request)
        : await this.prepareAudio(request);
    } catch (error) {
      if (error instanceof TransientAssetError) {
        logger.warn(error.message);
      } else {
        logger.error(`Could not prepare ${request.mode} for song ${request.song.songId}`, error);
      }
      return null;
    }
  }

  private async prepareImage(request: ClueRequest): Promise<ClueMedia | null> {
    const sourcePath = this.assets.imagePath(request.song);
    if (!sourcePath) {
      throw new TransientAssetError(`No ${request.mode} file for song ${request.song.songId}`);
    }

    const fullImage: ClueMedia = { kind: 'image', path: sourcePath, sourcePath, crop: null, temporary: false };
    if (request.imageDifficulty === 'easy' || !this.transcoder) {
      return fullImage;
    }

    let region: CropRegion | null = null;
    const outputPath = this.outputPath('crop', request.channelId, '.png');
    try {
      const size = await this.transcoder.probeImageSize(sourcePath);
      region = computeCropRegion(size.width, size.height, request.imageDifficulty, this.random);
      await fs.promises.mkdir(this.workDir, { recursive: true });
      const cropped = await this.transcoder.cropImage(sourcePath, region, outputPath);
      return { kind: 'image', path: cropped, sourcePath, crop: region, temporary: true };
    } catch (error) {
      logger.ffmpegError({
        inputPath: sourcePath,
        outputPath,
        stage: region ? 'crop' : 'probe',
        details: region ? JSON.stringify(region) : undefined,
        error
      });
      return fullImage;
    }
  }

  private async prepareAudio(request: ClueRequest): Promise<ClueMedia | null> {
    const sourcePath = this.assets.audioPath(request.song);
    if (!sourcePath) {
      throw new TransientAssetError(`No ${request.mode} file for song ${request.song.songId}`);
    }

    const untrimmed: ClueMedia = { kind: 'audio', path: sourcePath, sourcePath, window: null, temporary: false };
    if (!this.transcoder) {
      return untrimmed;
    }

    let window: SnippetWindow | null = null;
    const outputPath = this.outputPath('snippet', request.channelId, '.ogg');
    try {
      const duration = await this.transcoder.probeDuration(sourcePath);
      window = computeSnippetWindow(duration, request.snippetLengthSeconds, this.random);
      if (window.wholeSource) {
        return untrimmed;
      }

      await fs.promises.mkdir(this.workDir, { recursive: true });
      const snippet = await this.transcoder.extractSnippet(sourcePath, window, outputPath);
      return { kind: 'audio', path: snippet, sourcePath, window, temporary: true };
    } catch (error) {
      logger.ffmpegError({
        inputPath: sourcePath,
        outputPath,
        stage: window ? 'snippet' : 'probe',
        details: window ? `start=${window.startSeconds.toFixed(2)}s duration=${window.durationSeconds}s` : undefined,
        error
      });
      return untrimmed;
    }
  }

  private outputPath(prefix: string, channelId: string, extension: string): string {
    const randomId = crypto.randomBytes(4).toString('hex');
    return path.join(this.workDir, `${prefix}_${channelId}_${Date.now()}_${randomId}${extension}`);
  }
}

/** Deletes a generated clue file once it has been delivered. */
export const discardClueMedia = async (media: ClueMedia | null): Promise<void> => {
  if (!media || !media.temporary || media.path === media.sourcePath) return;

  try {
    await fs.promises.unlink(media.path);
  } catch (error) {
    logger.error(`Failed to delete temporary file ${media.path}`, error);
  }
};
