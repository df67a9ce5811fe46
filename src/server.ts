/**
 * HTTP surface: health, the Telegram webhook and the audit export.
 */

import cors from '@fastify/cors'
import Fastify, { type FastifyInstance } from 'fastify'
import { createHash, timingSafeEqual } from 'node:crypto'
import { parseTelegramUpdate, type TelegramClient } from './channels.js'
import type { Companion } from './companion/handler.js'
import { StateStoreUnavailable } from './errors.js'
import type { SafetyService } from './safety/safety-service.js'

export interface ServerDeps {
  companion: Companion
  safety: SafetyService
  telegram: TelegramClient
  webhookSecret?: string
  adminToken?: string
  /** Generation budget per message; the safety step is never cut short */
  generationTimeoutMs?: number
  logger?: boolean
}

const DEFAULT_GENERATION_TIMEOUT_MS = 20_000

function digestEquals(expected: string, actual: string): boolean {
  const a = createHash('sha256').update(expected).digest()
  const b = createHash('sha256').update(actual).digest()
  return timingSafeEqual(a, b)
}

function headerValue(header: string | string[] | undefined): string {
  return Array.isArray(header) ? header[0] ?? '' : header ?? ''
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { companion, safety, telegram } = deps
  const server = Fastify({ logger: deps.logger ?? true })

  await server.register(cors)

  server.get('/health', async () => ({
    status: 'ok',
    service: 'teen-support-companion',
  }))

  server.post<{ Body: unknown }>('/webhook/telegram', async (request, reply) => {
    if (deps.webhookSecret) {
      const incoming = headerValue(request.headers['x-telegram-bot-api-secret-token'])
      if (!digestEquals(deps.webhookSecret, incoming)) {
        server.log.warn('Telegram webhook: invalid secret token')
        return reply.code(403).send({ ok: false, error: 'Forbidden' })
      }
    }

    const update = parseTelegramUpdate(request.body)
    if (!update) return { ok: true }

    if (update.kind === 'callback') {
      await telegram.answerCallbackQuery(update.callbackId)
      const directive = await companion.handleCallback(update.userId, update.data, update.timestamp, {
        firstName: update.firstName,
      })
      if (directive) await telegram.sendMessage(update.chatId, directive.text, directive.keyboard)
      return { ok: true }
    }

    telegram.sendChatAction(update.chatId, 'typing')
    const directive = await companion.handleMessage(update.userId, update.text, update.timestamp, {
      firstName: update.firstName,
      signal: AbortSignal.timeout(deps.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS),
    })
    const sent = await telegram.sendMessage(update.chatId, directive.text, directive.keyboard)
    if (!sent) {
      server.log.error({ userId: update.userId, state: directive.state }, 'Telegram reply was not delivered')
    }
    return { ok: true }
  })

  server.get<{ Params: { userId: string } }>('/admin/audit/:userId', async (request, reply) => {
    if (!deps.adminToken) return reply.code(404).send({ error: 'Not found' })

    const auth = headerValue(request.headers.authorization)
    const token = auth.startsWith('Bearer ') ? auth.slice('Bearer '.length) : ''
    if (!digestEquals(deps.adminToken, token)) {
      return reply.code(401).send({ error: 'Unauthorized' })
    }

    try {
      return await safety.exportAudit(request.params.userId)
    } catch (err) {
      if (err instanceof StateStoreUnavailable) {
        server.log.error(err.toJSON(), 'Audit export failed')
        return reply.code(503).send({ error: 'State store unavailable' })
      }
      throw err
    }
  })

  return server
}
