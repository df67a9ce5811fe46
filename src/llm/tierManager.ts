/**
 * Generative backend with a provider fallback chain.
 *
 *   Groq 70B → Gemini Flash 2.0 → Gemini 1.5 Flash
 *
 * Each provider call is retried with exponential backoff for transient
 * errors before moving to the next provider. When every provider fails the
 * caller gets a GenerativeBackendError and answers with a static reply.
 */

import Groq from 'groq-sdk'
import { z } from 'zod'
import { GenerativeBackendError } from '../errors.js'
import type { StyleDirective } from '../safety/types.js'
import { withRetry } from '../utils/retry.js'
import { buildMessages, type GenerationContext } from './prompts/supportPrompt.js'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant'
    content: string
}

export interface CallOptions {
    maxTokens?: number
    temperature?: number
    signal?: AbortSignal
}

export interface LLMProvider {
    name: string
    enabled: () => boolean
    call: (messages: ChatMessage[], opts: CallOptions) => Promise<string>
}

export interface GenerationResult {
    text: string
    provider: string
}

// ─── Provider Factories ─────────────────────────────────────────────────────

let groqClient: Groq | null = null
function getGroq(): Groq {
    if (!groqClient) {
        groqClient = new Groq({ apiKey: process.env.GROQ_API_KEY })
    }
    return groqClient
}

function toGroqMessage(message: ChatMessage): Groq.Chat.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content }
        case 'assistant':
            return { role: 'assistant', content: message.content }
        default:
            return { role: 'user', content: message.content }
    }
}

export function makeGroqProvider(model: string, label: string): LLMProvider {
    return {
        name: label,
        enabled: () => Boolean(process.env.GROQ_API_KEY),
        call: async (messages, opts) => {
            const completion = await getGroq().chat.completions.create(
                {
                    model,
                    messages: messages.map(toGroqMessage),
                    max_tokens: opts.maxTokens ?? 400,
                    temperature: opts.temperature ?? 0.7,
                },
                { signal: opts.signal },
            )
            return completion.choices[0]?.message?.content ?? ''
        },
    }
}

const GeminiResponseSchema = z.object({
    candidates: z.array(z.object({
        content: z.object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
        }).optional(),
    })).optional(),
})

export class ProviderHttpError extends Error {
    constructor(readonly provider: string, readonly status: number, body: string) {
        super(`${provider} ${status}: ${body.slice(0, 200)}`)
        this.name = 'ProviderHttpError'
    }
}

export function makeGeminiProvider(model: string, label: string): LLMProvider {
    return {
        name: label,
        enabled: () => Boolean(process.env.GEMINI_API_KEY),
        call: async (messages, opts) => {
            const apiKey = process.env.GEMINI_API_KEY
            if (!apiKey) throw new Error('GEMINI_API_KEY not set')

            // Gemini takes one system instruction; reminders are folded into it
            const system = messages.filter(m => m.role === 'system').map(m => m.content).join('\n\n')
            const contents = messages
                .filter(m => m.role !== 'system')
                .map(m => ({ role: m.role === 'assistant' ? 'model' : 'user', parts: [{ text: m.content }] }))

            const body = {
                contents,
                generationConfig: {
                    maxOutputTokens: opts.maxTokens ?? 400,
                    temperature: opts.temperature ?? 0.7,
                },
                ...(system ? { systemInstruction: { parts: [{ text: system }] } } : {}),
            }

            const url = `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent?key=${apiKey}`
            const resp = await fetch(url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(body),
                signal: opts.signal,
            })

            if (!resp.ok) {
                const err = await resp.text().catch(() => '')
                throw new ProviderHttpError(label, resp.status, err)
            }

            const parsed = GeminiResponseSchema.safeParse(await resp.json())
            if (!parsed.success) return ''
            return parsed.data.candidates?.[0]?.content?.parts?.[0]?.text ?? ''
        },
    }
}

// ─── Provider Chain ─────────────────────────────────────────────────────────

export const SUPPORT_PROVIDERS: LLMProvider[] = [
    makeGroqProvider('llama-3.3-70b-versatile', 'groq-70b'),
    makeGeminiProvider('gemini-2.0-flash', 'gemini-flash-2.0'),
    makeGeminiProvider('gemini-1.5-flash', 'gemini-1.5-flash'),
]

async function callWithFallback(
    providers: LLMProvider[],
    messages: ChatMessage[],
    opts: CallOptions,
): Promise<GenerationResult> {
    const failures: string[] = []

    for (const provider of providers) {
        if (!provider.enabled()) continue
        if (opts.signal?.aborted) break

        try {
            console.log(`[LLM] Using ${provider.name}`)
            const text = (await withRetry(() => provider.call(messages, opts), provider.name, opts.signal)).trim()
            if (text) return { text, provider: provider.name }
            failures.push(`${provider.name}: empty`)
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err)
            console.warn(`[LLM] ${provider.name} failed, falling back to next provider: ${message}`)
            failures.push(`${provider.name}: ${message}`)
        }
    }

    if (opts.signal?.aborted) {
        throw new GenerativeBackendError('Generation cancelled', { context: { failures } })
    }
    console.error('[LLM] All providers exhausted')
    throw new GenerativeBackendError('All generative providers failed', { context: { failures } })
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Generate a supportive reply. Only called when the arbiter allowed
 * generation; the directive always travels with the request.
 */
export async function maybeGenerate(
    context: GenerationContext,
    directive: StyleDirective,
    opts: CallOptions = {},
    providers: LLMProvider[] = SUPPORT_PROVIDERS,
): Promise<GenerationResult> {
    const messages = buildMessages(context, directive)
    return callWithFallback(providers, messages, opts)
}

export type Generate = typeof maybeGenerate
