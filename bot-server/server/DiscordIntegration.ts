import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import type { TrackRequestHandler } from './RequestCoordinator';
import { findTrackReference } from './spotify';
import type { RequestLog, Requester } from './queries';
import { toTrackRequestError } from '../../shared/TrackRequestError';
import type { DeliveryResult } from '../../shared/messages';
import { createLogger, errorMessage, formatBytes, formatTime } from '../../shared/util';

interface ReplyEmbed {
  title: string;
  description?: string;
  fields?: Array<{ name: string, value: string, inline?: boolean }>;
}

export interface ReplyPayload {
  content?: string;
  embeds?: ReplyEmbed[];
  files?: Array<{ attachment: string, name: string }>;
}

// The parts of a discord.js Message the bot touches
export interface IncomingMessage {
  content: string;
  author: {
    id: string;
    username: string;
    globalName?: string | null;
    bot: boolean;
  };
  reply(payload: ReplyPayload): Promise<unknown>;
}

const UPLOAD_FAILED_MESSAGE = 'Uploading the track failed, try again later.';

interface DiscordIntegrationOptions {
  maxUploadBytes: number;
}

export function formatDelivery(delivery: DeliveryResult): ReplyPayload {
  const { metadata } = delivery;
  const fields = [{
    name: 'Duration',
    value: formatTime(metadata.durationSeconds),
    inline: true,
  }, {
    name: 'Size',
    value: formatBytes(delivery.fileSizeBytes),
    inline: true,
  }];
  if (metadata.album) {
    fields.unshift({ name: 'Album', value: metadata.album, inline: true });
  }
  return {
    embeds: [{
      title: [metadata.artist, metadata.title].filter(s => s).join(' - '),
      fields,
    }],
    files: [{
      attachment: delivery.filePath,
      name: `${metadata.artist} - ${metadata.title}.mp3`.replace(/[\\/:*?"<>|]+/g, '_'),
    }],
  };
}

export default class DiscordIntegration {
  private client: Client;

  constructor(
    private coordinator: TrackRequestHandler,
    private requests: RequestLog | null,
    private options: DiscordIntegrationOptions,
  ) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages,
      ],
      // DM channels are not cached until the first message arrives
      partials: [Partials.Channel],
    });
    this.client.once(Events.ClientReady, (client) => {
      this.log('Logged in as', client.user.tag);
    });
    this.client.on(Events.MessageCreate, (message) => {
      this.handleMessage(message).catch((e: unknown) => {
        this.error('Unhandled error for message', message.id, errorMessage(e));
      });
    });
  }

  private log = createLogger('Discord');
  private warn = createLogger('Discord', 'warn');
  private error = createLogger('Discord', 'error');

  public async start(token: string) {
    await this.client.login(token);
  }

  public async stop() {
    await this.client.destroy();
  }

  public handleMessage = async (message: IncomingMessage) => {
    if (message.author.bot) return;
    const reference = findTrackReference(message.content);
    if (!reference) return;

    const requester: Requester = {
      id: message.author.id,
      username: message.author.username,
      displayName: message.author.globalName ?? null,
    };
    this.log('Track request from', requester.username, reference);
    const requestId = await this.openRequest(reference, requester);

    let delivery: DeliveryResult;
    try {
      delivery = await this.coordinator.handle(reference);
    } catch (e) {
      const err = toTrackRequestError(e, 'DOWNLOAD_FAILED');
      this.warn('Request for', reference, 'failed with', err.type, err.message);
      await message.reply({ content: err.userMessage });
      await this.closeRequest(requestId, (requests, id) => requests.markFailed(id, err.type));
      return;
    }

    const { key, cached } = delivery;
    const tooLarge = delivery.fileSizeBytes > this.options.maxUploadBytes;
    try {
      try {
        await message.reply(tooLarge
          ? { content: `That track is ${formatBytes(delivery.fileSizeBytes)}, over the upload limit of ${formatBytes(this.options.maxUploadBytes)}.` }
          : formatDelivery(delivery));
      } catch (e) {
        this.warn('Reply for', key, 'could not be sent:', errorMessage(e));
        await this.closeRequest(requestId, (requests, id) => requests.markFailed(id, 'UPLOAD_FAILED', key));
        await message.reply({ content: UPLOAD_FAILED_MESSAGE });
        return;
      }
      await this.closeRequest(requestId, tooLarge
        ? (requests, id) => requests.markFailed(id, 'UPLOAD_TOO_LARGE', key)
        : (requests, id) => requests.markDelivered(id, key, cached));
    } finally {
      await delivery.release();
    }
  };

  // The request log is bookkeeping only; a broken table never blocks a delivery
  private async openRequest(reference: string, requester: Requester) {
    if (!this.requests) return null;
    try {
      await this.requests.recordRequester(requester);
      return await this.requests.createRequest(reference, requester.id);
    } catch (e) {
      this.warn('Could not log request', reference, errorMessage(e));
      return null;
    }
  }

  private async closeRequest(
    requestId: number | null,
    update: (requests: RequestLog, id: number) => Promise<void>,
  ) {
    if (!this.requests || requestId === null) return;
    try {
      await update(this.requests, requestId);
    } catch (e) {
      this.warn('Could not update request', requestId, errorMessage(e));
    }
  }
}
