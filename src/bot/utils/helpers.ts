import { Message, MessagePayload, MessageCreateOptions } from 'discord.js';
import { GameOptionsInput } from '../../game/options';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export type CommandName = 'quiz' | 'skip' | 'stop' | 'leaderboard' | 'again' | 'filters' | 'qhelp';

export interface CommandArgs {
  command: CommandName;
  args: string[];
}

const COMMAND_ALIASES = new Map<string, CommandName>([
  ['quiz', 'quiz'],
  ['skip', 'skip'],
  ['stop', 'stop'],
  ['lb', 'leaderboard'],
  ['leaderboard', 'leaderboard'],
  ['again', 'again'],
  ['replay', 'again'],
  ['filters', 'filters'],
  ['qhelp', 'qhelp'],
  ['qh', 'qhelp']
]);

/**
 * Parses "<prefix><command> [args...]". Returns null for anything that is
 * not one of the bot's commands, so the message can be treated as a guess.
 */
export const parseCommand = (content: string, prefix: string): CommandArgs | null => {
  if (!content.startsWith(prefix)) {
    return null;
  }

  const parts = content.substring(prefix.length).trim().split(/\s+/).filter(p => p !== '');
  if (parts.length === 0) {
    return null;
  }

  const command = COMMAND_ALIASES.get(parts[0].toLowerCase());
  if (!command) {
    return null;
  }

  return { command, args: parts.slice(1) };
};

const OPTION_KEYS = new Map<string, keyof GameOptionsInput>([
  ['mode', 'mode'],
  ['answer', 'answerType'],
  ['answer_type', 'answerType'],
  ['rounds', 'rounds'],
  ['time', 'timeLimitSeconds'],
  ['time_limit', 'timeLimitSeconds'],
  ['snippet', 'snippetLengthSeconds'],
  ['snippet_length', 'snippetLengthSeconds'],
  ['crop', 'imageDifficulty'],
  ['image_difficulty', 'imageDifficulty'],
  ['categories', 'categories'],
  ['versions', 'versions']
]);

// q>quiz [mode] [answer] [rounds] [time] [snippet] [crop]
const POSITIONAL_KEYS: (keyof GameOptionsInput)[] = [
  'mode',
  'answerType',
  'rounds',
  'timeLimitSeconds',
  'snippetLengthSeconds',
  'imageDifficulty'
];

/**
 * Turns quiz command arguments into raw options. Accepts key=value pairs
 * and bare positional values in any mix; positional values fill the slots
 * in POSITIONAL_KEYS order. Range checks happen later in validateGameOptions.
 */
export const parseQuizOptions = (args: string[]): GameOptionsInput => {
  const options: GameOptionsInput = {};
  let position = 0;

  for (const arg of args) {
    const separator = arg.indexOf('=');
    if (separator > 0) {
      const rawKey = arg.substring(0, separator).toLowerCase();
      const key = OPTION_KEYS.get(rawKey);
      if (!key) {
        throw new ValidationError(
          `Unknown option: ${rawKey}. Valid options: ${[...OPTION_KEYS.keys()].join(', ')}`,
          [rawKey]
        );
      }
      options[key] = arg.substring(separator + 1);
      continue;
    }

    const key = POSITIONAL_KEYS[position];
    if (!key) {
      throw new ValidationError(`Too many arguments: ${arg}`, [arg]);
    }
    options[key] = arg;
    position++;
  }

  return options;
};

// Discord API error 50013: Missing Permissions
const isMissingPermissions = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 50013;

/**
 * Safely send a reply to a message, handling permission errors gracefully
 * @returns True if successful, false if failed
 */
export const safeReply = async (message: Message, content: string | MessagePayload | MessageCreateOptions): Promise<boolean> => {
  try {
    await message.reply(content);
    return true;
  } catch (error) {
    if (isMissingPermissions(error)) {
      logger.warn(`Missing permissions to reply in ${message.channelId}`);
    } else {
      logger.error('Error sending reply', error);
    }
    return false;
  }
};
