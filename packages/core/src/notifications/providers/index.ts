export {
  DISCORD_COLOURS,
  DiscordProvider,
  buildDiscordPayload,
  type DiscordEmbed,
  type DiscordPayload,
  type DiscordProviderOptions,
} from './discord.js';
export { EmailProvider, renderEmailText, type EmailProviderOptions } from './email.js';
export {
  WebhookProvider,
  buildWebhookPayload,
  type WebhookPayload,
  type WebhookProviderOptions,
} from './webhook.js';
