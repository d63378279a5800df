import path from 'path';
import {
  ActionRowBuilder,
  AttachmentBuilder,
  ButtonBuilder,
  ButtonStyle,
  Colors,
  EmbedBuilder,
  MessageCreateOptions
} from 'discord.js';
import { AssetLocator } from '../catalog/assetLocator';
import { ResolvedFilters } from '../catalog/filters';
import { FilterCatalog } from '../game/service';
import { QuizEvent, QuizEventSink, ScoreEntry } from '../game/events';
import { AnswerType } from '../game/matcher';
import { GameOptions } from '../game/options';
import { AnswerReveal, displayTitle, formatDifficulty } from '../game/reveal';
import { discardClueMedia } from '../services/media/clueMedia';
import { logger } from '../utils/logger';

export const SKIP_BUTTON_ID = 'quiz:skip';
export const REPLAY_BUTTON_ID = 'quiz:replay';

export interface RenderedMessage {
  embed: EmbedBuilder;
  files: AttachmentBuilder[];
  buttons: ButtonBuilder[];
}

/** Anything the bot can post a quiz message into */
export interface QuizChannel {
  send(options: MessageCreateOptions): Promise<unknown>;
}

export type ChannelResolver = (channelId: string) => Promise<QuizChannel | null>;

const FIELD_LABELS: Record<AnswerType, string> = {
  title: '📝 Title',
  artist: '🎤 Artist',
  difficulty: '📊 Difficulty'
};

const CROP_LABELS: Record<GameOptions['imageDifficulty'], string> = {
  easy: 'Easy (full image)',
  medium: 'Medium (50% crop)',
  hard: 'Hard (31.6% crop)'
};

const MEDALS = ['🥇', '🥈', '🥉'];

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

const skipButton = (): ButtonBuilder =>
  new ButtonBuilder()
    .setCustomId(SKIP_BUTTON_ID)
    .setLabel('Skip')
    .setEmoji('⏭️')
    .setStyle(ButtonStyle.Secondary);

const replayButton = (): ButtonBuilder =>
  new ButtonBuilder()
    .setCustomId(REPLAY_BUTTON_ID)
    .setLabel('Play Again')
    .setEmoji('🔁')
    .setStyle(ButtonStyle.Primary);

export const formatScoreLine = (entry: ScoreEntry): string => {
  const marker = MEDALS[entry.rank - 1] ?? `${entry.rank}.`;
  return `${marker} <@${entry.userId}>: ${entry.score} point(s)`;
};

/** Song details shown under the answer; never repeats the guessed field. */
const revealDetails = (reveal: AnswerReveal): { name: string; value: string; inline: boolean }[] => {
  const { song } = reveal;
  const artist = song.artist || 'Unknown';
  const version = song.version || 'Unknown';

  switch (reveal.answerType) {
    case 'title':
      return [
        { name: 'Artist', value: artist, inline: false },
        { name: 'Difficulty', value: formatDifficulty(song), inline: true },
        { name: 'Version', value: version, inline: true }
      ];
    case 'artist':
      return [
        { name: 'Difficulty', value: formatDifficulty(song), inline: true },
        { name: 'Version', value: version, inline: true }
      ];
    case 'difficulty':
      return [
        { name: 'Title', value: displayTitle(song), inline: false },
        { name: 'Artist', value: artist, inline: false },
        { name: 'Version', value: version, inline: true }
      ];
  }
};

export class QuizPresenter {
  constructor(private readonly assets: AssetLocator) {}

  render(event: QuizEvent): RenderedMessage {
    switch (event.type) {
      case 'game-started':
        return this.gameStarted(event.options, event.totalRounds, event.filters, event.replay);
      case 'round-started': {
        const { clue, media } = event;
        const embed = new EmbedBuilder()
          .setTitle(`🎮 Round ${clue.round}/${clue.totalRounds}`)
          .setDescription(`**Guess the ${clue.answerType}!**\nType your answer in chat.`)
          .setColor(Colors.Green);

        for (const field of clue.fields) {
          embed.addFields({ name: FIELD_LABELS[field.name], value: field.value ?? '???', inline: true });
        }
        embed.addFields({ name: '⏱️ Time Limit', value: `${clue.timeLimitSeconds}s`, inline: true });

        const files: AttachmentBuilder[] = [];
        if (media?.kind === 'image') {
          files.push(new AttachmentBuilder(media.path, { name: 'cover.png' }));
          embed.setImage('attachment://cover.png');
        } else if (media?.kind === 'audio') {
          files.push(new AttachmentBuilder(media.path, { name: `snippet${path.extname(media.path)}` }));
        } else {
          embed.setFooter({ text: 'No media available for this song' });
        }
        return { embed, files, buttons: [skipButton()] };
      }
      case 'round-won':
        return this.reveal(
          new EmbedBuilder()
            .setTitle('✅ Correct!')
            .setDescription(`**<@${event.userId}>** got it in **${event.elapsedSeconds.toFixed(2)}s**!`)
            .setColor(Colors.Gold),
          event.reveal,
          'Answer',
          { name: 'Score', value: `${event.score} point(s)`, inline: true }
        );
      case 'round-timeout':
        return this.reveal(
          new EmbedBuilder()
            .setTitle('⏰ Time\'s Up!')
            .setDescription('No one guessed correctly!')
            .setColor(Colors.Red),
          event.reveal,
          '✅ Correct Answer'
        );
      case 'round-skipped':
        return this.reveal(
          new EmbedBuilder()
            .setTitle('⏭️ Skipped')
            .setDescription('Moving to next round...')
            .setColor(Colors.Orange),
          event.reveal,
          '✅ Correct Answer'
        );
      case 'game-ended': {
        const embed = new EmbedBuilder()
          .setTitle(event.cancelled ? '🛑 Game Stopped' : '🏁 Game Over!')
          .setColor(event.cancelled ? Colors.Red : Colors.Gold);

        if (event.finalScores.length > 0) {
          const podium = event.finalScores.slice(0, 3).map(formatScoreLine).join('\n');
          embed
            .setDescription(`Played ${event.roundsPlayed} round(s)\n\n${podium}`)
            .setFooter({ text: `Total players: ${event.finalScores.length}` });
        } else {
          embed.setDescription(`Played ${event.roundsPlayed} round(s)\n\nNo scores recorded.`);
        }
        return { embed, files: [], buttons: event.replayAvailable ? [replayButton()] : [] };
      }
    }
  }

  renderLeaderboard(entries: ScoreEntry[], round: number, totalRounds: number): RenderedMessage {
    const embed = new EmbedBuilder()
      .setTitle('🏆 Leaderboard')
      .setColor(Colors.Gold)
      .setDescription(entries.length > 0 ? entries.slice(0, 10).map(formatScoreLine).join('\n') : 'No scores yet!')
      .setFooter({ text: `Round ${round}/${totalRounds}` });
    return { embed, files: [], buttons: [] };
  }

  renderFilters(filters: FilterCatalog, prefix: string): RenderedMessage {
    const entryLine = ({ key, alias }: { key: string; alias: string }): string => `• **${alias}** (${key})`;
    const middle = Math.floor(filters.versions.length / 2);

    const embed = new EmbedBuilder()
      .setTitle('📋 Available Filters')
      .setDescription('Comma-separated values, case-insensitive, English or Japanese')
      .setColor(Colors.Blue)
      .addFields(
        { name: 'Categories', value: filters.categories.map(entryLine).join('\n') || '-', inline: false },
        { name: 'Versions (1/2)', value: filters.versions.slice(0, middle).map(entryLine).join('\n') || '-', inline: true },
        { name: 'Versions (2/2)', value: filters.versions.slice(middle).map(entryLine).join('\n') || '-', inline: true }
      )
      .setFooter({ text: `Example: ${prefix}quiz categories=pops,touhou versions=festival,buddies` });
    return { embed, files: [], buttons: [] };
  }

  private gameStarted(
    options: GameOptions,
    totalRounds: number,
    filters: ResolvedFilters,
    replay: boolean
  ): RenderedMessage {
    const lines = [
      `**Mode:** ${capitalize(options.mode)}`,
      `**Guess:** ${capitalize(options.answerType)}`,
      `**Rounds:** ${totalRounds}`,
      `**Time per round:** ${options.timeLimitSeconds}s`
    ];
    if (options.mode === 'image') {
      lines.push(`**Image Difficulty:** ${CROP_LABELS[options.imageDifficulty]}`);
    } else {
      lines.push(`**Snippet length:** ${options.snippetLengthSeconds}s`);
    }
    if (filters.categories.length > 0) {
      lines.push(`**Categories:** ${filters.categories.join(', ')}`);
    }
    if (filters.versions.length > 0) {
      lines.push(`**Versions:** ${filters.versions.join(', ')}`);
    }

    const embed = new EmbedBuilder()
      .setTitle(replay ? '🔁 Song Quiz Restarted!' : '🎵 Song Quiz Started!')
      .setDescription(lines.join('\n'))
      .setColor(Colors.Blue)
      .setFooter({ text: 'Get ready! The first round starts in a few seconds...' });
    return { embed, files: [], buttons: [] };
  }

  private reveal(
    embed: EmbedBuilder,
    reveal: AnswerReveal,
    answerLabel: string,
    extra?: { name: string; value: string; inline: boolean }
  ): RenderedMessage {
    embed.addFields({ name: answerLabel, value: reveal.answer, inline: false }, ...revealDetails(reveal));
    if (extra) {
      embed.addFields(extra);
    }

    const files: AttachmentBuilder[] = [];
    const cover = this.coverPath(reveal);
    if (cover) {
      files.push(new AttachmentBuilder(cover, { name: 'answer.png' }));
      embed.setThumbnail('attachment://answer.png');
    }
    return { embed, files, buttons: [] };
  }

  private coverPath(reveal: AnswerReveal): string | null {
    try {
      return this.assets.imagePath(reveal.song);
    } catch (error) {
      logger.error(`Cover lookup failed for song ${reveal.song.songId}`, error);
      return null;
    }
  }
}

export const toMessageOptions = (rendered: RenderedMessage): MessageCreateOptions => ({
  embeds: [rendered.embed],
  files: rendered.files,
  components: rendered.buttons.length > 0
    ? [new ActionRowBuilder<ButtonBuilder>().addComponents(rendered.buttons)]
    : []
});

/**
 * Posts every quiz event to its channel. Generated clue files are deleted
 * once the message is sent, or when it can't be.
 */
export const createEventSink = (presenter: QuizPresenter, resolveChannel: ChannelResolver): QuizEventSink =>
  async event => {
    const media = event.type === 'round-started' ? event.media : null;
    try {
      const channel = await resolveChannel(event.channelId);
      if (!channel) {
        logger.warn(`Channel ${event.channelId} is not available; dropping ${event.type}`);
        return;
      }
      await channel.send(toMessageOptions(presenter.render(event)));
    } finally {
      await discardClueMedia(media);
    }
  };
