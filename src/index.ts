#!/usr/bin/env node
/**
 * Sannu: Hausa/English Telegram chat bot
 *
 * Entry point: commander-based CLI.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { z } from 'zod';
import { loadConfig, requireTelegramToken } from './config/config.js';
import { createApp } from './bootstrap.js';
import { TelegramChannel } from './channels/telegram-channel.js';
import * as log from './utils/logger.js';

const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../package.json'));

interface CliOptions {
  message?: string;
  name: string;
  debug?: boolean;
}

const program = new Command();

program
  .name('sannu-bot')
  .description('Telegram chat bot with AI replies and a Hausa/English fallback responder')
  .version(version)
  .option('-m, --message <text>', 'Resolve a single message, print the reply and exit')
  .option('-n, --name <name>', 'Sender name for --message', 'User')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (opts: CliOptions) => {
    const config = await loadConfig(opts.debug ? { logging: { level: 'debug' } } : undefined);
    log.setLogLevel(config.logging.level);

    // Single-message mode
    if (opts.message !== undefined) {
      const app = createApp(config);
      const reply = await app.resolver.resolve({ text: opts.message, senderDisplayName: opts.name });
      console.log(reply);
      return;
    }

    const token = requireTelegramToken(config);
    const app = createApp(config);

    const ac = new AbortController();
    const { signal } = ac;

    process.on('SIGINT', () => {
      console.log('\nShutting down...');
      ac.abort();
    });
    process.on('SIGTERM', () => ac.abort());

    const telegram = new TelegramChannel();
    await telegram.start(token, app.resolver, config, signal);
    log.info('Bot stopped');
  });

program.parseAsync().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
