/**
 * Static supportive replies used when generation is unavailable, filtered or
 * cancelled. Keyword buckets are checked in order; the first hit wins.
 */

export type FallbackKind = 'anxiety' | 'low_mood' | 'stress' | 'greeting' | 'default'

interface FallbackBucket {
  kind: Exclude<FallbackKind, 'default'>
  pattern: RegExp
  reply: (name: string) => string
}

const BUCKETS: FallbackBucket[] = [
  {
    kind: 'anxiety',
    pattern: /\b(anxious|anxiety|panic|panicking|worried|nervous)\b/i,
    reply: name => `I hear that you're feeling anxious, ${name}. That's really tough to sit with.

Try this grounding exercise:
• 5 things you can see
• 4 things you can touch
• 3 things you can hear
• 2 things you can smell
• 1 thing you can taste

Anxiety comes in waves and this one will pass too. What's worrying you most right now? 🌸`,
  },
  {
    kind: 'low_mood',
    pattern: /\b(depressed|sad|down|empty|lonely|numb|crying)\b/i,
    reply: name => `Thank you for telling me how you feel, ${name}. When everything feels heavy, even small things take a lot.

Some small steps that can help:
• One tiny thing you used to enjoy
• Messaging one person you trust
• A warm shower or some fresh air
• Music that matches or lifts your mood

You matter, and feelings like this can shift with support. Is there one small thing you could do for yourself today? 💜`,
  },
  {
    kind: 'stress',
    pattern: /\b(stressed|stress|overwhelmed|pressure|exams?|homework)\b/i,
    reply: name => `It sounds like there's a lot of pressure on you right now, ${name}. That's exhausting.

Quick reset:
• Three slow breaths, in for 4 and out for 6
• Write down the one thing that matters most today
• Stretch for a minute

Big problems get easier in small pieces. What's the biggest source of stress right now? 📚`,
  },
  {
    kind: 'greeting',
    pattern: /^\s*(hello|hi|hey|good (morning|afternoon|evening))\b/i,
    reply: name => `Hey ${name}! 🌟 I'm here to listen and help you find ways to cope.

You can just tell me how you're feeling, check in with /mood, or try /breathe for a quick calming exercise.

How are you doing today? 💙`,
  },
]

function defaultReply(name: string): string {
  return `Thanks for sharing that with me, ${name}. I'm here to listen.

• /mood to check in with how you're feeling
• /breathe for a short calming exercise
• /crisis for support numbers any time

What's most on your mind right now? 🌟`
}

export function classifyFallback(text: string): FallbackKind {
  return BUCKETS.find(bucket => bucket.pattern.test(text))?.kind ?? 'default'
}

export function pickFallback(text: string, name = 'friend'): string {
  const bucket = BUCKETS.find(b => b.pattern.test(text))
  return bucket ? bucket.reply(name) : defaultReply(name)
}
