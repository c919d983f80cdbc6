import { TelegramClient, type Api } from 'telegram';
import { StringSession } from 'telegram/sessions/index.js';
import { NewMessage, type NewMessageEvent } from 'telegram/events/NewMessage.js';
import bigInt from 'big-integer';

export interface IncomingText {
  chatId: string;
  text: string;
  reply(text: string): Promise<void>;
}

/**
 * What a bot needs from Telegram. The GramJS implementation below is the only
 * production one; tests provide their own.
 */
export interface BotTransport {
  start(): Promise<void>;
  sendHtml(chatId: string, text: string): Promise<void>;
  onText(handler: (message: IncomingText) => Promise<void>): void;
  isConnected(): boolean;
  disconnect(): Promise<void>;
}

export interface GramJsSettings {
  apiId: number;
  apiHash: string;
  botToken: string;
}

/** Bot API style chat id for a peer: users positive, groups `-id`, channels `-100id` */
export function getPeerChatId(peer: Api.TypePeer): string {
  if ('userId' in peer) {
    return peer.userId.toString();
  }
  if ('chatId' in peer) {
    return `-${peer.chatId.toString()}`;
  }
  return `-100${peer.channelId.toString()}`;
}

export class GramJsTransport implements BotTransport {
  private readonly client: TelegramClient;

  constructor(private readonly settings: GramJsSettings) {
    // Bot sessions are cheap to recreate, so nothing is persisted
    this.client = new TelegramClient(new StringSession(''), settings.apiId, settings.apiHash, {
      connectionRetries: 5,
    });
  }

  async start(): Promise<void> {
    await this.client.start({ botAuthToken: this.settings.botToken });
  }

  async sendHtml(chatId: string, text: string): Promise<void> {
    await this.client.sendMessage(bigInt(chatId), {
      message: text,
      parseMode: 'html',
      linkPreview: false,
    });
  }

  onText(handler: (message: IncomingText) => Promise<void>): void {
    this.client.addEventHandler(async (event: NewMessageEvent) => {
      const message = event.message;
      if (!message.message || !message.peerId) return;

      await handler({
        chatId: getPeerChatId(message.peerId),
        text: message.message,
        reply: async (text) => {
          await message.reply({ message: text, parseMode: 'html', linkPreview: false });
        },
      });
    }, new NewMessage({ incoming: true }));
  }

  isConnected(): boolean {
    return this.client.connected ?? false;
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }
}
