/**
 * Output filtering for generated replies.
 *
 * A generated reply that mentions methods, doses or lethality, breaks role or
 * leaks the prompt is dropped and replaced by a static supportive reply.
 */

const FORBIDDEN_OUTPUT_PATTERNS = [
  // Prompt leakage
  /system\s*prompt/gi,
  /my\s*instructions?\s*(are|is|say|tell)/gi,
  /style\s*directive/gi,
  /sandwich\s*defense/gi,

  // Role breaking
  /as\s*an?\s*(ai|language\s*model)/gi,
  /i'?m\s*(actually\s*)?(just\s*)?an?\s*(ai|language\s*model)\b/gi,

  // Method, means and lethality details
  /\b(lethal|fatal|deadly)\s*(dose|amount|quantity)/gi,
  /\bhow\s*many\s*(pills|tablets)\b/gi,
  /\b\d+\s*(mg|milligrams?|grams?|tablets|pills)\b/gi,
  /\b(overdose|od)\s*(on|with)\b/gi,
  /\bhow\s*to\s*(kill|hurt|harm|cut|hang|poison)\b/gi,
  /\b(painless|quick(est)?|easiest)\s*(way|method)\s*to\s*(die|end)/gi,
  /\bnoose\b/gi,
  /\bhang(ing)?\s*(myself|yourself|themselves)\b/gi,
]

export const MAX_OUTPUT_LENGTH = 1200

export interface OutputFilterResult {
  filtered: string
  wasFiltered: boolean
  reason?: string
  /** True when the reply was dropped and must be replaced */
  blocked: boolean
}

export function filterOutput(output: string): OutputFilterResult {
  for (const pattern of FORBIDDEN_OUTPUT_PATTERNS) {
    const hit = pattern.test(output)
    pattern.lastIndex = 0
    if (hit) {
      return {
        filtered: '',
        wasFiltered: true,
        blocked: true,
        reason: `forbidden_pattern: ${pattern.source}`,
      }
    }
  }

  const trimmed = output.trim()
  if (!trimmed) {
    return { filtered: '', wasFiltered: true, blocked: true, reason: 'empty' }
  }

  let filtered = trimmed
  if (trimmed.length > MAX_OUTPUT_LENGTH) {
    // Truncate at sentence boundary if possible
    const truncated = trimmed.slice(0, MAX_OUTPUT_LENGTH)
    const lastSentenceEnd = Math.max(
      truncated.lastIndexOf('.'),
      truncated.lastIndexOf('?'),
      truncated.lastIndexOf('!'),
    )
    filtered = lastSentenceEnd > MAX_OUTPUT_LENGTH * 0.7
      ? truncated.slice(0, lastSentenceEnd + 1)
      : truncated + '...'
  }

  return {
    filtered,
    wasFiltered: filtered !== trimmed,
    blocked: false,
    reason: filtered !== trimmed ? 'length_truncated' : undefined,
  }
}

export function needsHumanReview(result: OutputFilterResult): boolean {
  return result.blocked && (result.reason?.startsWith('forbidden_pattern') ?? false)
}
