import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { logger } from './utils/logger';

export interface BotConfig {
  discordToken: string | null;
  commandPrefix: string;
  catalogPath: string;
  imagesDir: string;
  audioDir: string;
  snippetsDir: string;
  ffmpegPath: string | null;
  ffprobePath: string | null;
}

/**
 * Loads the first .env file found, then falls back to whatever is already
 * in process.env.
 */
export const loadEnvironment = (cwd: string = process.cwd()): string | null => {
  const envPaths = [
    path.resolve(cwd, '.env'),
    path.resolve(cwd, '../.env')
  ];

  for (const envPath of envPaths) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      logger.info(`Loaded environment from ${envPath}`);
      return envPath;
    }
  }

  logger.warn('No .env file found. Falling back to process.env variables.');
  return null;
};

const optional = (value: string | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

export const readConfig = (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): BotConfig => ({
  discordToken: optional(env.DISCORD_TOKEN),
  commandPrefix: optional(env.COMMAND_PREFIX) ?? 'q>',
  catalogPath: path.resolve(cwd, optional(env.CATALOG_PATH) ?? 'output.json'),
  imagesDir: path.resolve(cwd, optional(env.IMAGES_DIR) ?? 'images'),
  audioDir: path.resolve(cwd, optional(env.AUDIO_DIR) ?? 'audio'),
  snippetsDir: path.resolve(cwd, optional(env.SNIPPETS_DIR) ?? path.join('audio', 'snippets')),
  ffmpegPath: optional(env.FFMPEG_PATH),
  ffprobePath: optional(env.FFPROBE_PATH)
});
