import fs from 'fs';
import path from 'path';

const LOG_DIR = path.resolve(process.env.LOG_DIR || path.join(process.cwd(), 'logs'));

const FFMPEG_LOG_FILE = path.join(LOG_DIR, 'ffmpeg.log');
const ERROR_LOG_FILE = path.join(LOG_DIR, 'error.log');
const GENERAL_LOG_FILE = path.join(LOG_DIR, 'app.log');

let logDirReady = false;

const fileLoggingEnabled = (): boolean => process.env.NODE_ENV !== 'test';

const logToFile = (file: string, message: string): void => {
  if (!fileLoggingEnabled()) return;

  try {
    if (!logDirReady) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
      logDirReady = true;
    }
    fs.appendFileSync(file, `${message}\n`, { encoding: 'utf8' });
  } catch (error) {
    console.error(`Error writing to log file: ${error}`);
  }
};

const describeError = (error: unknown): string => {
  if (error === undefined || error === null) return '';
  return error instanceof Error ? error.message : String(error);
};

export interface TranscodeFailure {
  inputPath: string;
  outputPath?: string;
  stage: 'probe' | 'snippet' | 'crop';
  details?: string;
  error: unknown;
}

export const logger = {
  info: (message: string): void => {
    const logEntry = `[${new Date().toISOString()}] INFO: ${message}`;
    console.log(logEntry);
    logToFile(GENERAL_LOG_FILE, logEntry);
  },

  warn: (message: string): void => {
    const logEntry = `[${new Date().toISOString()}] WARN: ${message}`;
    console.warn(logEntry);
    logToFile(GENERAL_LOG_FILE, logEntry);
  },

  error: (message: string, error?: unknown): void => {
    const errorMessage = describeError(error);
    const logEntry = `[${new Date().toISOString()}] ERROR: ${message}${errorMessage ? `: ${errorMessage}` : ''}`;

    console.error(logEntry);
    logToFile(ERROR_LOG_FILE, logEntry);
  },

  debug: (message: string): void => {
    if (process.env.NODE_ENV === 'development') {
      const logEntry = `[${new Date().toISOString()}] DEBUG: ${message}`;
      console.log(logEntry);
      logToFile(GENERAL_LOG_FILE, logEntry);
    }
  },

  ffmpeg: (message: string): void => {
    const logEntry = `[${new Date().toISOString()}] FFMPEG: ${message}`;
    console.log(logEntry);
    logToFile(FFMPEG_LOG_FILE, logEntry);
  },

  ffmpegError: (failure: TranscodeFailure): void => {
    const errorMessage = describeError(failure.error);

    const logEntry = [
      `[${new Date().toISOString()}] FFMPEG ${failure.stage.toUpperCase()} FAILURE`,
      `Input: ${failure.inputPath}`,
      failure.outputPath ? `Output: ${failure.outputPath}` : '',
      failure.details ? `Details: ${failure.details}` : '',
      `Error: ${errorMessage}`,
      '---'
    ].filter(line => line).join('\n');

    console.error(`FFmpeg ${failure.stage} failed: ${errorMessage}`);
    logToFile(FFMPEG_LOG_FILE, logEntry);
  }
};
