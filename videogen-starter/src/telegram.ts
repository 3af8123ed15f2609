import TelegramBot from 'node-telegram-bot-api';
import { logger } from './logger.js';
import type { StarterConfig } from './config.js';

let bot: TelegramBot | null = null;
let chatId: string | null = null;

export function initTelegram(config: Pick<StarterConfig, 'TELEGRAM_BOT_TOKEN' | 'TELEGRAM_CHAT_ID'>): void {
  if (!config.TELEGRAM_BOT_TOKEN || !config.TELEGRAM_CHAT_ID) {
    logger.debug('Telegram bot token or chat ID not configured, skipping Telegram notifications');
    return;
  }

  bot = new TelegramBot(config.TELEGRAM_BOT_TOKEN);
  chatId = config.TELEGRAM_CHAT_ID;
  logger.info('Telegram bot initialized');
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export async function sendTelegramMessage(message: string): Promise<void> {
  if (!bot || !chatId) {
    return;
  }

  try {
    await bot.sendMessage(chatId, message, { parse_mode: 'HTML' });
  } catch (error) {
    logger.error({ error }, 'Failed to send Telegram message');
  }
}

export function formatFailureMessage(workflowId: string, error: string): string {
  return `🚨 <b>Video generation failed</b>\n\nWorkflow ID: <code>${escapeHtml(workflowId)}</code>\nError: <code>${escapeHtml(error)}</code>`;
}

export function formatCompletionMessage(workflowId: string, uri: string, clipCount: number): string {
  return `🎬 <b>Video ready</b>\n\nWorkflow ID: <code>${escapeHtml(workflowId)}</code>\nClips: ${clipCount}\nLocation: <code>${escapeHtml(uri)}</code>`;
}

export async function sendErrorNotification(workflowId: string, error: string): Promise<void> {
  await sendTelegramMessage(formatFailureMessage(workflowId, error));
}

export async function sendCompletionNotification(workflowId: string, uri: string, clipCount: number): Promise<void> {
  await sendTelegramMessage(formatCompletionMessage(workflowId, uri, clipCount));
}
