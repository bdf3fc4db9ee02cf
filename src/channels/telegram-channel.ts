import { Bot, type Context } from 'grammy';
import type { BotConfig } from '../config/schema.js';
import type { ReplyResolver } from '../reply/reply-resolver.js';
import type { InboundMessage } from '../reply/types.js';
import { COMMANDS, START_TEXT, HELP_TEXT, echoText } from './commands.js';
import * as log from '../utils/logger.js';

const DEFAULT_SENDER = 'User';

/** The slice of a chat the text handler talks to. grammy's context in production, a fake in tests. */
export interface ChatIO {
  reply(text: string): Promise<unknown>;
  sendTyping(): Promise<unknown>;
}

/** True when the text opens with a bot command, which the command handlers own. */
export function isCommand(entities: ReadonlyArray<{ type: string; offset: number }> | undefined): boolean {
  return (entities ?? []).some(e => e.type === 'bot_command' && e.offset === 0);
}

export function isAllowed(allowlist: string[], chatId: string, username?: string): boolean {
  if (allowlist.length === 0) return true;
  return allowlist.includes(chatId) || (username !== undefined && allowlist.includes(username));
}

/**
 * Resolve and send the reply for one text message.
 * Send failures are logged, never thrown into grammy's dispatch loop.
 */
export async function handleText(resolver: ReplyResolver, msg: InboundMessage, io: ChatIO): Promise<void> {
  const reply = await resolver.resolve(msg, { beforeCompletion: () => io.sendTyping() });

  try {
    await io.reply(reply);
  } catch (err) {
    log.error(`Telegram: failed to send reply to ${msg.chatId ?? '?'}: ${log.errorMessage(err)}`);
  }
}

function chatIO(ctx: Context): ChatIO {
  return {
    reply: (text) => ctx.reply(text),
    sendTyping: () => ctx.replyWithChatAction('typing'),
  };
}

/**
 * Telegram channel: receives and answers messages via the Telegram Bot API.
 * Uses grammy (TypeScript-native, long polling).
 */
export class TelegramChannel {
  private bot: Bot | undefined;

  private register(bot: Bot, resolver: ReplyResolver, config: BotConfig): void {
    const { allowlist } = config.telegram;

    // Global error handler: a failing handler must not stop the polling loop
    bot.catch((err) => {
      log.error(`Telegram bot error: ${log.errorMessage(err.error)}`);
    });

    // Allowlist check, ahead of commands and text
    bot.use(async (ctx, next) => {
      const chatId = ctx.chat ? String(ctx.chat.id) : '';
      if (!isAllowed(allowlist, chatId, ctx.from?.username)) {
        log.debug(`Telegram: ignoring update from chat ${chatId || '?'} (not in allowlist)`);
        return;
      }
      await next();
    });

    bot.command('start', (ctx) => ctx.reply(START_TEXT));
    bot.command('help', (ctx) => ctx.reply(HELP_TEXT));
    bot.command('echo', (ctx) => ctx.reply(echoText(ctx.match)));

    bot.on('message:text', async (ctx) => {
      if (isCommand(ctx.message.entities)) {
        log.debug(`Telegram: ignoring unknown command ${ctx.message.text.split(/\s/)[0]}`);
        return;
      }

      const inbound: InboundMessage = {
        text: ctx.message.text ?? '',
        senderDisplayName: ctx.from?.first_name || DEFAULT_SENDER,
        chatId: String(ctx.chat.id),
      };

      await handleText(resolver, inbound, chatIO(ctx));
    });
  }

  /**
   * Start long polling and block until the signal aborts.
   * Rejects when polling fails (e.g. the token is invalid).
   */
  async start(token: string, resolver: ReplyResolver, config: BotConfig, signal: AbortSignal): Promise<void> {
    const bot = new Bot(token);
    this.bot = bot;
    this.register(bot, resolver, config);

    try {
      await bot.api.setMyCommands([...COMMANDS]);
    } catch (err) {
      log.warn(`Telegram: could not publish command list: ${log.errorMessage(err)}`);
    }

    if (signal.aborted) return;

    const onAbort = () => this.stop();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      log.info('Telegram: starting bot...');
      // Resolves once bot.stop() has finished
      await bot.start({
        onStart: (info) => {
          log.info(`Telegram: connected as @${info.username}`);
        },
      });
    } finally {
      signal.removeEventListener('abort', onAbort);
      this.bot = undefined;
    }
  }

  stop(): void {
    this.bot?.stop().catch((err: unknown) => {
      log.warn(`Telegram: error during bot.stop(): ${log.errorMessage(err)}`);
    });
  }
}
