import {
  Client,
  GatewayIntentBits,
  Events,
  Message,
  ChatInputCommandInteraction,
  SlashCommandBuilder,
  REST,
  Routes
} from 'discord.js';
import { config } from 'dotenv';
import { BotContext, describeError } from '../../../src/index.js';
import { DatabaseService } from './database.js';

config();

const TOKEN = process.env.DISCORD_TOKEN;
const DEFAULT_PREFIX = process.env.COMMAND_PREFIX ?? '!';
const TEST_GUILD_ID = process.env.TEST_GUILD_ID;
const SETTINGS_PATH = process.env.SETTINGS_PATH ?? './data/settings.json';

if (!TOKEN) {
  console.error('DISCORD_TOKEN is required in environment variables');
  process.exit(1);
}

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
    GatewayIntentBits.DirectMessages
  ]
});

const context = await BotContext.create({ settingsPath: SETTINGS_PATH });
let storage: DatabaseService;

async function initializeDatabase(): Promise<void> {
  if (!(await context.start())) {
    console.error('❌ Failed to start the database, check', SETTINGS_PATH);
    process.exit(1);
  }
  storage = await DatabaseService.open(context);
  context.onShutdown(() => client.destroy());
  console.log('✅ Database initialized');
}

async function registerSlashCommands(token: string, applicationId: string): Promise<void> {
  if (!TEST_GUILD_ID) {
    console.log('⚠️  TEST_GUILD_ID not set, skipping guild command registration');
    return;
  }

  const commands = [
    new SlashCommandBuilder().setName('ping').setDescription('Test bot responsiveness'),

    new SlashCommandBuilder()
      .setName('profile')
      .setDescription('View user profile (works in DMs and servers)')
      .addUserOption((option) =>
        option.setName('user').setDescription('User to view (defaults to you)').setRequired(false)
      ),

    new SlashCommandBuilder()
      .setName('leaderboard')
      .setDescription('Show top users by experience')
      .addIntegerOption((option) =>
        option
          .setName('limit')
          .setDescription('Number of users to show (1-10)')
          .setMinValue(1)
          .setMaxValue(10)
          .setRequired(false)
      ),

    new SlashCommandBuilder().setName('usage').setDescription('Show how often you used each command'),

    new SlashCommandBuilder().setName('dbstats').setDescription('Show database cache statistics')
  ];

  try {
    const rest = new REST().setToken(token);
    console.log('🔄 Registering guild slash commands...');
    await rest.put(Routes.applicationGuildCommands(applicationId, TEST_GUILD_ID), {
      body: commands.map((cmd) => cmd.toJSON())
    });
    console.log('✅ Guild slash commands registered');
  } catch (error) {
    console.error('❌ Failed to register slash commands:', error);
  }
}

function describeStats(): string {
  const stats = context.databases.stats.snapshot();
  return `
📈 **Database statistics**
Cache hits: ${stats.cacheHits}
Cache misses: ${stats.cacheMisses}
Fetches: ${stats.fetchSuccesses} found (avg ${stats.averageFetchSuccessTime} ms), ${stats.fetchFailures} missing (avg ${stats.averageFetchFailureTime} ms)
Open views: ${context.database.size()}
  `;
}

async function describeLeaderboard(contextId: string, limit: number): Promise<string> {
  const topUsers = await storage.getTopUsers(contextId, Math.min(limit, 10));
  if (topUsers.length === 0) {
    return '📊 No user data found yet!';
  }
  const leaderboard = topUsers
    .map((user, index) => `${index + 1}. **${user.username}** - Level ${user.level} (${user.experience} XP)`)
    .join('\n');
  return `🏆 **Leaderboard - Top ${topUsers.length} Users**\n${leaderboard}`;
}

async function describeUsage(contextId: string, userId: string): Promise<string> {
  const usage = await storage.getCommandUsage(contextId, userId);
  if (usage.length === 0) {
    return 'No commands used yet.';
  }
  return usage.map(([command, count]) => `• \`${command}\`: ${count}`).join('\n');
}

async function handlePrefixCommand(message: Message): Promise<void> {
  if (message.author.bot) return;

  const guildId = message.guild?.id ?? null;
  const prefix = await storage.getPrefix(guildId, DEFAULT_PREFIX);
  if (!message.content.startsWith(prefix)) return;

  const args = message.content.slice(prefix.length).trim().split(/ +/);
  const command = args.shift()?.toLowerCase() ?? '';
  const contextId = DatabaseService.getContextId(guildId, message.author.id);

  try {
    const { levelledUp, profile } = await storage.awardExperience(
      contextId,
      message.author.id,
      message.author.displayName
    );
    await storage.recordCommand(contextId, message.author.id, command);

    switch (command) {
      case 'ping':
        await message.reply('Pong! 🏓');
        break;

      case 'prefix': {
        const newPrefix = args[0];
        if (!message.guild || newPrefix === undefined) {
          await message.reply(`Current prefix: \`${prefix}\``);
          break;
        }
        await storage.setPrefix(message.guild.id, newPrefix);
        await message.reply(`✅ Prefix set to \`${newPrefix}\``);
        break;
      }

      case 'profile': {
        const targetUser = message.mentions.users.first() ?? message.author;
        const target = await storage.getOrCreateUserProfile(contextId, targetUser.id, targetUser.displayName);
        await message.reply(`
📊 **Profile for ${targetUser.displayName}**
🎯 Level: ${target.level}
⭐ Experience: ${target.experience}
📅 Created: ${new Date(target.createdAt).toLocaleDateString()}
        `);
        break;
      }

      case 'leaderboard':
        await message.reply(await describeLeaderboard(contextId, parseInt(args[0] ?? '', 10) || 10));
        break;

      case 'usage':
        await message.reply(await describeUsage(contextId, message.author.id));
        break;

      case 'dbstats':
        await message.reply(describeStats());
        break;

      default:
        await message.reply(`❓ Unknown command. Try \`${prefix}ping\`, \`${prefix}profile\` or \`${prefix}usage\`.`);
    }

    if (levelledUp) {
      await message.reply(`🎉 ${message.author.displayName} reached level ${profile.level}!`);
    }
  } catch (error) {
    console.error('Error handling prefix command:', error);
    await message.reply(`❌ Something went wrong: ${describeError(error)}`);
  }
}

async function handleSlashCommand(interaction: ChatInputCommandInteraction): Promise<void> {
  const contextId = DatabaseService.getContextId(interaction.guild?.id ?? null, interaction.user.id);

  try {
    await storage.awardExperience(contextId, interaction.user.id, interaction.user.displayName);
    await storage.recordCommand(contextId, interaction.user.id, interaction.commandName);

    switch (interaction.commandName) {
      case 'ping':
        await interaction.reply('Pong! 🏓');
        break;

      case 'profile': {
        const user = interaction.options.getUser('user') ?? interaction.user;
        const profile = await storage.getOrCreateUserProfile(contextId, user.id, user.displayName);
        await interaction.reply(`
📊 **Profile for ${user.displayName}**
🎯 Level: ${profile.level}
⭐ Experience: ${profile.experience}
📅 Created: ${new Date(profile.createdAt).toLocaleDateString()}
        `);
        break;
      }

      case 'leaderboard':
        await interaction.reply(await describeLeaderboard(contextId, interaction.options.getInteger('limit') ?? 10));
        break;

      case 'usage':
        await interaction.reply(await describeUsage(contextId, interaction.user.id));
        break;

      case 'dbstats':
        await interaction.reply(describeStats());
        break;

      default:
        await interaction.reply('❓ Unknown command.');
    }
  } catch (error) {
    console.error('Error handling slash command:', error);
    if (!interaction.replied) {
      await interaction.reply('❌ Something went wrong.');
    }
  }
}

client.once(Events.ClientReady, async (readyClient) => {
  console.log(`🤖 Bot logged in as ${readyClient.user.tag}`);
  await registerSlashCommands(readyClient.token, readyClient.user.id);
});

client.on(Events.MessageCreate, handlePrefixCommand);
client.on(Events.InteractionCreate, async (interaction) => {
  if (interaction.isChatInputCommand()) {
    await handleSlashCommand(interaction);
  }
});

client.on('error', console.error);
process.on('unhandledRejection', console.error);

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    console.log(`🛑 Received ${signal}, shutting down`);
    context
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('❌ Shutdown failed:', error);
        process.exit(1);
      });
  });
}

async function start(): Promise<void> {
  await initializeDatabase();
  await client.login(TOKEN);
}

start().catch(console.error);
