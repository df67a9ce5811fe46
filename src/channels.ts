/**
 * Telegram channel adapter: webhook update parsing and Bot API calls.
 */

import { z } from 'zod'
import type { Keyboard } from './companion/types.js'
import { safeError } from './utils/safe-log.js'

const UserSchema = z.object({
  id: z.number(),
  first_name: z.string().optional(),
})

const ChatSchema = z.object({ id: z.number() })

const UpdateSchema = z.object({
  update_id: z.number().optional(),
  message: z.object({
    from: UserSchema,
    chat: ChatSchema,
    date: z.number(),
    text: z.string().optional(),
  }).optional(),
  callback_query: z.object({
    id: z.string(),
    from: UserSchema,
    data: z.string().optional(),
    message: z.object({ chat: ChatSchema }).optional(),
  }).optional(),
})

export type InboundUpdate =
  | {
    kind: 'message'
    userId: string
    chatId: string
    text: string
    timestamp: Date
    firstName?: string
  }
  | {
    kind: 'callback'
    callbackId: string
    userId: string
    chatId: string
    data: string
    timestamp: Date
    firstName?: string
  }

/** Null for updates the companion ignores (stickers, edits, joins, malformed bodies). */
export function parseTelegramUpdate(body: unknown, receivedAt: Date = new Date()): InboundUpdate | null {
  const parsed = UpdateSchema.safeParse(body)
  if (!parsed.success) return null
  const { message, callback_query: query } = parsed.data

  if (query) {
    if (!query.data || !query.message) return null
    return {
      kind: 'callback',
      callbackId: query.id,
      userId: String(query.from.id),
      chatId: String(query.message.chat.id),
      data: query.data,
      timestamp: receivedAt,
      firstName: query.from.first_name,
    }
  }

  if (message?.text) {
    return {
      kind: 'message',
      userId: String(message.from.id),
      chatId: String(message.chat.id),
      text: message.text,
      timestamp: new Date(message.date * 1000),
      firstName: message.from.first_name,
    }
  }
  return null
}

export interface TelegramClient {
  /** False when Telegram rejected the message after the plain-text retry. */
  sendMessage(chatId: string, text: string, keyboard?: Keyboard): Promise<boolean>
  answerCallbackQuery(callbackId: string): Promise<void>
  /** Fire-and-forget typing indicator. */
  sendChatAction(chatId: string, action: 'typing'): void
}

const ErrorBodySchema = z.object({ description: z.string().optional() }).passthrough()

function replyMarkup(keyboard: Keyboard | undefined): object {
  if (!keyboard || keyboard.length === 0) return {}
  return {
    reply_markup: {
      inline_keyboard: keyboard.map(row => row.map(b => ({ text: b.text, callback_data: b.data }))),
    },
  }
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export function createTelegramClient(token: string, fetchImpl: FetchLike = fetch): TelegramClient {
  const call = (method: string, body: object): Promise<Response> =>
    fetchImpl(`https://api.telegram.org/bot${token}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    })

  const describeFailure = async (resp: Response): Promise<string> => {
    const parsed = ErrorBodySchema.safeParse(await resp.json().catch(() => ({})))
    return parsed.success ? parsed.data.description ?? `HTTP ${resp.status}` : `HTTP ${resp.status}`
  }

  return {
    async sendMessage(chatId, text, keyboard) {
      try {
        const resp = await call('sendMessage', { chat_id: chatId, text, parse_mode: 'HTML', ...replyMarkup(keyboard) })
        if (resp.ok) return true

        const description = await describeFailure(resp)
        // HTML parse error (e.g. a stray "<" in generated text): retry as plain text
        if (description.includes('parse')) {
          const retry = await call('sendMessage', { chat_id: chatId, text, ...replyMarkup(keyboard) })
          if (retry.ok) return true
          console.error('[Telegram] sendMessage plain retry failed', { chatId, status: retry.status })
          return false
        }
        console.error('[Telegram] sendMessage failed', { chatId, description })
        return false
      } catch (err) {
        console.error('[Telegram] sendMessage error', { chatId, error: safeError(err) })
        return false
      }
    },

    async answerCallbackQuery(callbackId) {
      try {
        const resp = await call('answerCallbackQuery', { callback_query_id: callbackId })
        if (!resp.ok) console.warn('[Telegram] answerCallbackQuery failed', { status: resp.status })
      } catch (err) {
        console.warn('[Telegram] answerCallbackQuery error', { error: safeError(err) })
      }
    },

    sendChatAction(chatId, action) {
      void call('sendChatAction', { chat_id: chatId, action }).catch(err => {
        console.warn('[Telegram] sendChatAction error', { chatId, error: safeError(err) })
      })
    },
  }
}
