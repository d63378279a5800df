import { Message } from 'discord.js';
import { LIMITS } from '../../game/options';
import { logger } from '../../utils/logger';
import { safeReply } from '../utils/helpers';

type HelpCategory = {
  title: string;
  description: string;
  commands: Array<{ name: string; description: string }>;
  footer: string;
};

type HelpContent = {
  [key: string]: HelpCategory;
};

const buildHelpContent = (prefix: string): HelpContent => ({
  general: {
    title: '🎵 Song Quiz Bot Commands',
    description: 'Guess songs from their cover art or a short audio clip!',
    commands: [
      { name: `${prefix}quiz [mode] [answer] [rounds] [time] [snippet] [crop]`, description: 'Start a quiz in this channel' },
      { name: `${prefix}quiz mode=image answer=artist rounds=5`, description: 'Start a quiz with named options' },
      { name: `${prefix}skip`, description: 'Skip the current song (host only)' },
      { name: `${prefix}stop`, description: 'Stop the game (host only)' },
      { name: `${prefix}lb`, description: 'Show the leaderboard' },
      { name: `${prefix}again`, description: 'Replay the last game with the same settings (host only)' },
      { name: `${prefix}filters`, description: 'Show available categories and versions' },
      { name: `${prefix}qhelp [topic]`, description: 'Show help for a specific topic' }
    ],
    footer: `Type \`${prefix}qhelp [topic]\` for more details.\nAvailable topics: options, answers`
  },

  options: {
    title: '⚙️ Quiz Options',
    description: `Pass options as key=value, e.g. \`${prefix}quiz mode=audio time=30\`:`,
    commands: [
      { name: 'mode', description: '`image` (cover art) or `audio` (music clip). Default: audio' },
      { name: 'answer', description: '`title`, `artist` or `difficulty`. Default: title' },
      { name: 'rounds', description: `Number of songs (${LIMITS.rounds.min}-${LIMITS.rounds.max}). Default: 10` },
      { name: 'time', description: `Seconds per round (${LIMITS.timeLimitSeconds.min}-${LIMITS.timeLimitSeconds.max}). Default: 20` },
      { name: 'snippet', description: `Audio clip length in seconds (${LIMITS.snippetLengthSeconds.min}-${LIMITS.snippetLengthSeconds.max}). Default: 10` },
      { name: 'crop', description: '`easy` (full cover), `medium` or `hard` (small random crop). Default: easy' },
      { name: 'categories', description: 'Comma-separated genres, e.g. `pops,touhou`' },
      { name: 'versions', description: 'Comma-separated game versions, e.g. `festival,buddies`' }
    ],
    footer: 'If fewer songs match than the rounds you asked for, the game is shortened to fit.'
  },

  answers: {
    title: '💡 Answering',
    description: 'Type your guess directly in chat, no command needed:',
    commands: [
      { name: 'Titles', description: 'Japanese, romaji or English titles are all accepted' },
      { name: 'Near misses', description: 'Small typos and partial titles are accepted (fuzzy matching)' },
      { name: 'Difficulty', description: 'Type the chart level, e.g. `13.7`; `13,7` works too' }
    ],
    footer: 'First correct answer wins the point. Multiple games can run in different channels.'
  }
});

export const handleHelpCommand = async (message: Message, prefix: string, helpTopic?: string): Promise<void> => {
  try {
    const helpContent = buildHelpContent(prefix);
    const topic = helpTopic?.toLowerCase() || 'general';

    if (!Object.prototype.hasOwnProperty.call(helpContent, topic)) {
      await safeReply(
        message,
        `Unknown help topic: "${topic}". Available topics: ${Object.keys(helpContent).join(', ')}`
      );
      return;
    }

    const content = helpContent[topic];
    let helpMessage = `**${content.title}**\n${content.description}\n\n`;

    for (const cmd of content.commands) {
      helpMessage += `• \`${cmd.name}\` - ${cmd.description}\n`;
    }

    if (content.footer) {
      helpMessage += `\n${content.footer}`;
    }

    await safeReply(message, helpMessage);
  } catch (error) {
    logger.error('Error handling help command', error);
  }
};
