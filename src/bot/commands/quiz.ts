import { ButtonInteraction, Message } from 'discord.js';
import { QuizService } from '../../game/service';
import { isQuizError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { QuizPresenter, REPLAY_BUTTON_ID, SKIP_BUTTON_ID, toMessageOptions } from '../presenter';
import { parseQuizOptions, safeReply } from '../utils/helpers';

export interface QuizBotContext {
  service: QuizService;
  presenter: QuizPresenter;
  prefix: string;
}

/** QuizErrors carry a message meant for players; anything else is logged and hidden. */
const describeFailure = (error: unknown, action: string): string => {
  if (isQuizError(error)) {
    return `❌ ${error.message}`;
  }
  logger.error(`Error ${action}`, error);
  return `❌ Error ${action}. Please try again later.`;
};

export const handleQuizCommand = async (message: Message, args: string[], context: QuizBotContext): Promise<void> => {
  try {
    await context.service.startGame({
      channelId: message.channelId,
      hostId: message.author.id,
      options: parseQuizOptions(args)
    });
  } catch (error) {
    await safeReply(message, describeFailure(error, 'starting game'));
  }
};

export const handleSkipCommand = async (message: Message, context: QuizBotContext): Promise<void> => {
  try {
    context.service.skip(message.channelId, message.author.id);
  } catch (error) {
    await safeReply(message, describeFailure(error, 'skipping round'));
  }
};

export const handleStopCommand = async (message: Message, context: QuizBotContext): Promise<void> => {
  try {
    context.service.stop(message.channelId, message.author.id);
  } catch (error) {
    await safeReply(message, describeFailure(error, 'stopping game'));
  }
};

export const handleLeaderboardCommand = async (message: Message, context: QuizBotContext): Promise<void> => {
  try {
    const entries = context.service.getLeaderboard(message.channelId);
    const session = context.service.getSession(message.channelId);
    const rendered = context.presenter.renderLeaderboard(
      entries,
      session?.currentRound ?? 0,
      session?.totalRounds ?? 0
    );
    await safeReply(message, toMessageOptions(rendered));
  } catch (error) {
    await safeReply(message, describeFailure(error, 'showing leaderboard'));
  }
};

export const handleAgainCommand = async (message: Message, context: QuizBotContext): Promise<void> => {
  try {
    await context.service.replay(message.channelId, message.author.id);
  } catch (error) {
    await safeReply(message, describeFailure(error, 'restarting game'));
  }
};

export const handleFiltersCommand = async (message: Message, context: QuizBotContext): Promise<void> => {
  const rendered = context.presenter.renderFilters(await context.service.describeFilters(), context.prefix);
  await safeReply(message, toMessageOptions(rendered));
};

/**
 * Treats a non-command message as a guess.
 * @returns true when it won the round
 */
export const handleQuizAnswer = (message: Message, context: QuizBotContext): boolean =>
  context.service.submitGuess(message.channelId, message.author.id, message.content, message.author.bot);

/**
 * Skip and Play Again buttons. Replies are ephemeral; the round and game
 * messages themselves come from the event sink.
 */
export const handleQuizButton = async (interaction: ButtonInteraction, context: QuizBotContext): Promise<void> => {
  const { channelId, customId } = interaction;
  if (!channelId) return;

  if (customId === SKIP_BUTTON_ID) {
    let content = '⏭️ Skipping to next round...';
    try {
      context.service.skip(channelId, interaction.user.id);
    } catch (error) {
      content = describeFailure(error, 'skipping round');
    }
    await interaction.reply({ content, ephemeral: true });
    return;
  }

  if (customId === REPLAY_BUTTON_ID) {
    // Loading the catalog can outlast the interaction's response window
    await interaction.deferReply({ ephemeral: true });
    let content = '🔁 Starting new game with same settings...';
    try {
      await context.service.replay(channelId, interaction.user.id);
    } catch (error) {
      content = describeFailure(error, 'restarting game');
    }
    await interaction.editReply(content);
  }
};
