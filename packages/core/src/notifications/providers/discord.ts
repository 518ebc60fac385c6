/**
 * Discord webhook provider
 *
 * One embed per message, coloured by level, with the details as inline
 * fields. Screenshots go up as multipart file attachments.
 */

import { readFile as readFromDisk } from 'node:fs/promises';
import { basename } from 'node:path';

import { errorMessage } from '../../errors.js';
import type { NotificationLevel, NotificationMessage } from '../../types/index.js';
import { postToChannel } from '../http.js';
import { NotificationProvider, type DeliveryReceipt, type ProviderOptions } from '../provider.js';

export const DISCORD_COLOURS: Record<NotificationLevel, number> = {
  success: 0x00ff00,
  warning: 0xffaa00,
  error: 0xff0000,
  info: 0x0099ff,
};

// Discord embed limits
const MAX_TITLE = 256;
const MAX_DESCRIPTION = 4096;
const MAX_FIELDS = 25;
const MAX_FIELD_VALUE = 1024;

export interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  timestamp: string;
  fields: Array<{ name: string; value: string; inline: boolean }>;
  footer: { text: string };
}

export interface DiscordPayload {
  username: string;
  embeds: DiscordEmbed[];
}

export interface DiscordProviderOptions extends ProviderOptions {
  url: string;
  username?: string;
  timeoutMs?: number;
  readFile?: (path: string) => Promise<Uint8Array>;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export function buildDiscordPayload(message: NotificationMessage, username: string): DiscordPayload {
  return {
    username,
    embeds: [
      {
        title: truncate(message.title, MAX_TITLE),
        description: truncate(message.body, MAX_DESCRIPTION),
        color: DISCORD_COLOURS[message.level],
        timestamp: message.timestamp,
        fields: message.details.slice(0, MAX_FIELDS).map(([name, value]) => ({
          name,
          value: truncate(value, MAX_FIELD_VALUE),
          inline: true,
        })),
        footer: { text: `shiftclock • ${message.level.toUpperCase()}` },
      },
    ],
  };
}

export class DiscordProvider extends NotificationProvider {
  readonly name = 'discord';

  private readonly url: string;
  private readonly username: string;
  private readonly timeoutMs: number | undefined;
  private readonly readFile: (path: string) => Promise<Uint8Array>;

  constructor(options: DiscordProviderOptions) {
    super(options);
    this.url = options.url;
    this.username = options.username ?? 'shiftclock';
    this.timeoutMs = options.timeoutMs;
    this.readFile = options.readFile ?? readFromDisk;
  }

  protected async deliver(message: NotificationMessage): Promise<DeliveryReceipt> {
    const payload = JSON.stringify(buildDiscordPayload(message, this.username));

    if (message.attachments.length === 0) {
      return postToChannel(
        this.name,
        this.url,
        { body: payload, headers: { 'Content-Type': 'application/json' } },
        this.timeoutMs
      );
    }

    const form = new FormData();
    form.append('payload_json', payload);
    let index = 0;
    for (const path of message.attachments) {
      try {
        const data = await this.readFile(path);
        form.append(`files[${index}]`, new Blob([data]), basename(path));
        index++;
      } catch (error) {
        this.logger.warn('Attachment unreadable, skipping', { path, error: errorMessage(error) });
      }
    }

    return postToChannel(this.name, this.url, { body: form }, this.timeoutMs);
  }
}
