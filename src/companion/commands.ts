/**
 * Command texts and parsing. Commands never reach the generative backend.
 */

import type { RegionResources } from '../config/schema.js'
import { labelForScore, MOOD_EMOJI } from '../mood/mood-tracker.js'
import type { MoodEntry } from '../mood/types.js'
import type { Keyboard } from './types.js'

export const MOOD_CALLBACK_PREFIX = 'mood:'

export interface ParsedCommand {
  name: string
  args: string
}

/** "/mood@SomeBot 3 tired" -> { name: 'mood', args: '3 tired' } */
export function parseCommand(text: string): ParsedCommand | null {
  const match = /^\/([a-z]+)(?:@\w+)?(?:\s+([\s\S]*))?$/i.exec(text.trim())
  if (!match) return null
  return { name: match[1].toLowerCase(), args: (match[2] ?? '').trim() }
}

export function welcomeText(name: string): string {
  return `🌟 Hi ${name}, welcome!

I'm a support companion for teens. You can talk to me about how you're feeling, and I'll listen and share ideas that might help you cope.

Things you can do:
/mood - check in with how you're feeling
/moodlog - see your recent check-ins
/breathe - a short breathing exercise
/assess - a quick self-check questionnaire
/crisis - support numbers, any time
/help - all commands

I'm not a therapist and I can't replace emergency services, but I'm here to listen. How are you feeling today? 💙`
}

export function formatHelplines(region: RegionResources): string {
  const lines = region.helplines.map(line => {
    const contact = [line.phone, line.text].filter(Boolean).join(' / ')
    return `• ${line.name}${contact ? `: ${contact}` : ''}${line.hours ? ` (${line.hours})` : ''}`
  })
  return [...lines, `🚨 Emergency: ${region.emergency}`].join('\n')
}

export function helpText(region: RegionResources): string {
  return `🌟 Commands

/start - welcome and introduction
/help - this list
/mood [1-5] [note] - log how you're feeling
/moodlog - your recent mood check-ins
/breathe - box breathing exercise
/assess - self-check questionnaires
/cancel - stop a questionnaire
/crisis - support numbers

You can also just message me about how you're feeling.

Support in ${region.name}, any time:
${formatHelplines(region)}`
}

export const BREATHING_TEXT = `🫁 Box breathing

Let's slow things down together:

1. Breathe in through your nose for 4 seconds
2. Hold for 4 seconds
3. Breathe out slowly for 4 seconds
4. Hold for 4 seconds

Repeat 4 times. Let your shoulders drop as you breathe out.

How do you feel now? 💙`

export const MOOD_PROMPT = 'How are you feeling right now? Tap a number, 1 is awful and 5 is great.'

export function moodKeyboard(): Keyboard {
  return [[1, 2, 3, 4, 5].map(score => ({
    text: `${MOOD_EMOJI[labelForScore(score)]} ${score}`,
    data: `${MOOD_CALLBACK_PREFIX}${score}`,
  }))]
}

/** Parses "/mood 3 optional note". Null when the score is missing or not 1-5. */
export function parseMoodArgs(args: string): { score: number; note: string | null } | null {
  const match = /^([1-5])(?:\s+([\s\S]+))?$/.exec(args.trim())
  if (!match) return null
  return { score: Number(match[1]), note: match[2]?.trim() || null }
}

export function moodRecordedText(entry: MoodEntry): string {
  return `Thanks for checking in. Logged ${MOOD_EMOJI[entry.label]} ${entry.label} (${entry.score}/5).`
}

export function formatMoodLog(entries: readonly MoodEntry[], declining: boolean): string {
  if (entries.length === 0) return 'No mood check-ins yet. Try /mood to log how you feel.'
  const lines = entries.map(entry => {
    const day = entry.recordedAt.slice(0, 10)
    const note = entry.note ? ` · ${entry.note}` : ''
    return `${day} ${MOOD_EMOJI[entry.label]} ${entry.label} (${entry.score}/5)${note}`
  })
  const footer = declining
    ? '\n\nIt looks like things have been getting harder lately. Want to talk about it? 💙'
    : ''
  return `📈 Your recent check-ins\n\n${lines.join('\n')}${footer}`
}
