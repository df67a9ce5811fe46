/**
 * Input sanitization before text reaches a generative provider.
 * Classification always sees the original text; only the prompt copy is cleaned.
 */

const MAX_MESSAGE_LENGTH = 1000

// Patterns commonly used in prompt injection attacks
const INJECTION_PATTERNS = [
  /ignore\s*(all\s*)?(previous|above|prior|earlier|system)/gi,
  /forget\s*(all\s*)?(previous|above|prior|earlier|your)/gi,
  /disregard\s*(all\s*)?(previous|instructions)/gi,
  /new\s*instructions?:/gi,
  /system\s*prompt/gi,
  /you\s*are\s*now/gi,
  /pretend\s*(to\s*be|you're|you\s*are)/gi,
  /roleplay\s*as/gi,
  /reveal\s*(your|the)\s*(instructions|prompt|system)/gi,
  /\[INST\]/gi,
  /<\/?system>/gi,
  /<<SYS>>/gi,
  /BEGIN\s*(SYSTEM|INSTRUCTIONS)/gi,
  /jailbreak/gi,
  /DAN\s*mode/gi,
]

const SUSPICIOUS_WORDS = ['instruction', 'directive', 'override', 'bypass', 'unlock', 'admin', 'developer', 'debug']

export interface SanitizationResult {
  sanitized: string
  wasModified: boolean
  suspiciousPatterns: string[]
  lengthTruncated: boolean
}

export function sanitizeInput(input: string): SanitizationResult {
  const suspiciousPatterns: string[] = []
  let modified = false
  let lengthTruncated = false

  let sanitized = input.trim()
  if (sanitized.length > MAX_MESSAGE_LENGTH) {
    sanitized = sanitized.slice(0, MAX_MESSAGE_LENGTH)
    lengthTruncated = true
    modified = true
  }

  for (const pattern of INJECTION_PATTERNS) {
    if (pattern.test(sanitized)) {
      suspiciousPatterns.push(pattern.source)
      sanitized = sanitized.replace(pattern, '[filtered]')
      modified = true
    }
    pattern.lastIndex = 0
  }

  const lowerInput = sanitized.toLowerCase()
  const suspiciousCount = SUSPICIOUS_WORDS.filter(word => lowerInput.includes(word)).length
  if (suspiciousCount >= 3) {
    suspiciousPatterns.push('high_suspicious_word_count')
  }

  sanitized = sanitized
    .replace(/[\u200B-\u200D\uFEFF]/g, '') // zero-width chars
    .replace(/[\u2028\u2029]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()

  return {
    sanitized,
    wasModified: modified || sanitized !== input.trim(),
    suspiciousPatterns,
    lengthTruncated,
  }
}

/** Logs pattern names only, never the input. */
export function logSuspiciousInput(userId: string, result: SanitizationResult): void {
  if (result.suspiciousPatterns.length > 0) {
    console.warn('[SECURITY] Suspicious input detected', {
      userId,
      patterns: result.suspiciousPatterns,
      timestamp: new Date().toISOString(),
    })
  }
}
