import { Message } from 'discord.js';
import { logger } from '../../utils/logger';
import { parseCommand, safeReply } from '../utils/helpers';
import { handleHelpCommand } from './help';
import {
  handleAgainCommand,
  handleFiltersCommand,
  handleLeaderboardCommand,
  handleQuizAnswer,
  handleQuizCommand,
  handleSkipCommand,
  handleStopCommand,
  QuizBotContext
} from './quiz';

/**
 * Routes one chat message: prefix commands go to their handler, everything
 * else is offered to the channel's game as a guess.
 */
export async function processCommand(message: Message, context: QuizBotContext): Promise<void> {
  if (message.author.bot) return;

  const commandArgs = parseCommand(message.content, context.prefix);
  if (!commandArgs) {
    handleQuizAnswer(message, context);
    return;
  }

  logger.info(`Command received: ${commandArgs.command} from ${message.author.tag} in ${message.guild?.name || 'DM'}`);

  try {
    switch (commandArgs.command) {
      case 'quiz':
        await handleQuizCommand(message, commandArgs.args, context);
        break;
      case 'skip':
        await handleSkipCommand(message, context);
        break;
      case 'stop':
        await handleStopCommand(message, context);
        break;
      case 'leaderboard':
        await handleLeaderboardCommand(message, context);
        break;
      case 'again':
        await handleAgainCommand(message, context);
        break;
      case 'filters':
        await handleFiltersCommand(message, context);
        break;
      case 'qhelp':
        await handleHelpCommand(message, context.prefix, commandArgs.args[0]);
        break;
    }
  } catch (error) {
    logger.error(`Error executing command ${commandArgs.command}`, error);
    await safeReply(message, 'An error occurred while processing your command. Please try again later.');
  }
}
