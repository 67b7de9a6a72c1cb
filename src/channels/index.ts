export type {
  Channel,
  CircuitStats,
  ReminderSender,
  SendOptions,
  SendResult,
} from './channel.js';

export {
  DiscordChannel,
  createDiscordChannel,
  type CommandHandler,
  type DiscordConfig,
  type GuildLeaveHandler,
  type ReadyHook,
} from './discord.js';

export { ChannelReminderSender, createReminderSender } from './reminder-sender.js';
export { formatReminderMessage, formatTestPing, roleMention } from './reminder-format.js';
