/**
 * Discord REST notifier: plain messages for transitions plus one status embed
 * per channel that is replaced on every change
 */

import axios, { AxiosInstance } from 'axios';
import { Notifier, ResourceStatus, StatusBoard } from '../types';
import { DeliveryError, errorMessage } from '../error-handling';
import { logger } from '../utils/logger';

export const DISCORD_API_URL = 'https://discord.com/api/v10';
export const ROLE_FALLBACK = 'people';

export type DiscordClient = Pick<AxiosInstance, 'post' | 'delete'>;

export interface DiscordNotifierOptions {
  token: string;
  baseURL?: string;
  timeoutMs?: number;
  client?: DiscordClient;
}

export interface DiscordEmbed {
  title: string;
  description?: string;
  color: number;
  fields: Array<{ name: string; value: string; inline: boolean }>;
}

const STATUS_COLOURS: Record<ResourceStatus, number> = {
  up: rgb(21, 250, 59),
  down: rgb(220, 23, 30),
  unknown: rgb(215, 187, 10)
};

export class DiscordNotifier implements Notifier {
  private client: DiscordClient;
  private log = logger.child('DiscordNotifier');

  constructor(options: DiscordNotifierOptions) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseURL ?? DISCORD_API_URL,
        headers: {
          'Authorization': `Bot ${options.token}`,
          'Content-Type': 'application/json'
        },
        timeout: options.timeoutMs ?? 10000
      });
  }

  mentionRole(role: string | null): string {
    return role === null ? ROLE_FALLBACK : `<@&${role}>`;
  }

  async notify(channel: string, role: string | null, message: string): Promise<void> {
    try {
      await this.client.post(`/channels/${channel}/messages`, {
        content: message,
        allowed_mentions: { parse: [], roles: role === null ? [] : [role] }
      });
      this.log.info(`Sent notification to channel ${channel}`);
    } catch (error) {
      throw toDeliveryError(`Failed to send notification to channel ${channel}`, channel, error);
    }
  }

  /**
   * Delete the previous status embed (a missing one is fine) and post a new one.
   */
  async publishStatus(channel: string, board: StatusBoard, previousMessageId: string | null): Promise<string | null> {
    if (previousMessageId !== null) {
      try {
        await this.client.delete(`/channels/${channel}/messages/${previousMessageId}`);
        this.log.debug(`Deleted old status message ${previousMessageId} in channel ${channel}`);
      } catch (error) {
        if (!(axios.isAxiosError(error) && error.response?.status === 404)) {
          throw toDeliveryError(`Failed to delete status message ${previousMessageId}`, channel, error);
        }
        this.log.warn(`Status message ${previousMessageId} in channel ${channel} no longer exists`);
      }
    }

    let data: unknown;
    try {
      const response = await this.client.post(`/channels/${channel}/messages`, {
        embeds: [buildStatusEmbed(board)],
        allowed_mentions: { parse: [] }
      });
      data = response.data;
    } catch (error) {
      throw toDeliveryError(`Failed to send status message to channel ${channel}`, channel, error);
    }

    const messageId = extractMessageId(data);
    this.log.info(`Sent status message ${messageId ?? '(no id)'} to channel ${channel}`);
    return messageId;
  }
}

export function buildStatusEmbed(board: StatusBoard): DiscordEmbed {
  const fields = [
    { name: 'Since', value: `<t:${Math.floor(board.since.getTime() / 1000)}:R>`, inline: false },
    { name: 'Address', value: board.resource_address, inline: false }
  ];

  switch (board.status) {
    case 'up':
      return { title: `${board.resource_name} is online!`, color: STATUS_COLOURS.up, fields };
    case 'down':
      return { title: `${board.resource_name} is offline!`, color: STATUS_COLOURS.down, fields };
    case 'unknown':
      return {
        title: `${board.resource_name} status is unknown`,
        description: 'The watchdog could not determine the status yet.',
        color: STATUS_COLOURS.unknown,
        fields
      };
  }
}

function rgb(red: number, green: number, blue: number): number {
  return (red << 16) + (green << 8) + blue;
}

function extractMessageId(data: unknown): string | null {
  if (typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'string') {
    return data.id;
  }
  return null;
}

function toDeliveryError(message: string, channel: string, error: unknown): DeliveryError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return new DeliveryError(`${message}: ${error.message}`, channel, status);
  }
  return new DeliveryError(`${message}: ${errorMessage(error)}`, channel);
}
