import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import { processCommand } from './bot/commands';
import { handleQuizButton, QuizBotContext } from './bot/commands/quiz';
import { createEventSink, QuizChannel, QuizPresenter } from './bot/presenter';
import { FileAssetLocator } from './catalog/assetLocator';
import { fileChartSource, SongCatalog } from './catalog/songCatalog';
import { loadEnvironment, readConfig } from './config';
import { QuizService } from './game/service';
import { ClueMediaPreparer } from './services/media/clueMedia';
import { FfmpegTranscoder } from './services/media/transcoder';
import { logger } from './utils/logger';

loadEnvironment();
const config = readConfig();

logger.info(`Environment: ${process.env.NODE_ENV || 'development'}`);
logger.info(`Catalog: ${config.catalogPath}`);

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent
  ],
  partials: [Partials.Channel]
});

const resolveChannel = async (channelId: string): Promise<QuizChannel | null> => {
  const channel = await client.channels.fetch(channelId);
  return channel && 'send' in channel ? channel : null;
};

const assets = new FileAssetLocator(config.imagesDir, config.audioDir);
const presenter = new QuizPresenter(assets);
const service = new QuizService({
  catalog: new SongCatalog(fileChartSource(config.catalogPath), assets),
  clues: new ClueMediaPreparer(
    assets,
    new FfmpegTranscoder({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath }),
    config.snippetsDir
  ),
  sink: createEventSink(presenter, resolveChannel)
});

const context: QuizBotContext = { service, presenter, prefix: config.commandPrefix };

client.once(Events.ClientReady, (readyClient) => {
  logger.info(`Ready! Logged in as ${readyClient.user.tag}`);
});

client.on(Events.MessageCreate, async (message) => {
  try {
    await processCommand(message, context);
  } catch (error) {
    logger.error('Error handling message', error);
  }
});

client.on(Events.InteractionCreate, async (interaction) => {
  if (!interaction.isButton()) return;
  try {
    await handleQuizButton(interaction, context);
  } catch (error) {
    logger.error('Error handling button', error);
  }
});

const shutdown = (signal: string): void => {
  logger.info(`Received ${signal}, stopping ${service.activeGames()} game(s)`);
  service.shutdown();
  client.destroy()
    .catch(error => logger.error('Error closing Discord client', error))
    .finally(() => process.exit(0));
};

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

async function init(): Promise<void> {
  if (!config.discordToken) {
    throw new Error('Missing DISCORD_TOKEN environment variable');
  }
  await client.login(config.discordToken);
}

init().catch(error => {
  logger.error('Initialization error', error);
  process.exit(1);
});
