/**
 * Response arbiter: the only place a response strategy is chosen.
 *
 * crisis   -> fixed_safety            (verbatim payload, generation forbidden)
 * cooldown -> supportive_blended      (check-in payload, generation forbidden)
 * watchful -> supportive_blended      (generation with the watchful directive + footer)
 * normal   -> generative_passthrough  (generation with the normal directive)
 *
 * Anything missing or unexpected falls back to fixed_safety.
 */

import type { Resources, SafetySettings } from '../config/schema.js'
import type {
  EscalationState,
  PayloadId,
  ResponseDecision,
  RiskAssessment,
  StyleDirective,
  StyleDirectiveId,
} from './types.js'

export interface ArbiterConfig {
  resources: Resources
  styleDirectives: SafetySettings['styleDirectives']
}

export function resolveRegion(resources: Resources, region: string | undefined): string {
  if (region && resources.regions[region]) return region
  return resources.defaultRegion
}

/** Verbatim payload text, or null when the region does not define it. */
export function resolvePayload(resources: Resources, region: string, payloadId: PayloadId): string | null {
  const entry = resources.regions[region]
  if (!entry) return null
  return entry.payloads[payloadId] ?? null
}

function styleDirective(config: ArbiterConfig, id: StyleDirectiveId): StyleDirective | null {
  const instructions = config.styleDirectives[id]
  if (!instructions || instructions.length === 0) return null
  return { id, instructions: [...instructions] }
}

/**
 * The crisis payload for a region, falling back to the default region. The
 * default region's crisis payload is guaranteed by config validation.
 */
export function fixedSafety(resources: Resources, region: string | undefined): ResponseDecision {
  const resolved = resolveRegion(resources, region)
  const own = resolvePayload(resources, resolved, 'crisis')
  const payloadRegion = own ? resolved : resources.defaultRegion
  const payload = own ?? resolvePayload(resources, resources.defaultRegion, 'crisis') ?? ''

  return {
    strategy: 'fixed_safety',
    mustUseFixedPayload: true,
    allowGenerative: false,
    payloadId: 'crisis',
    payload,
    region: payloadRegion,
  }
}

function blended(
  config: ArbiterConfig,
  region: string,
  payloadId: PayloadId,
  directiveId: StyleDirectiveId,
  allowGenerative: boolean,
): ResponseDecision | null {
  const payload = resolvePayload(config.resources, region, payloadId)
  const directive = styleDirective(config, directiveId)
  if (!payload || !directive) return null

  return {
    strategy: 'supportive_blended',
    mustUseFixedPayload: false,
    allowGenerative,
    payloadId,
    payload,
    region,
    styleDirective: directive,
  }
}

export function decide(
  state: EscalationState,
  assessment: RiskAssessment,
  config: ArbiterConfig,
  requestedRegion?: string,
): ResponseDecision {
  const region = resolveRegion(config.resources, requestedRegion)

  if (state === 'crisis' || assessment.tier === 'crisis') {
    return fixedSafety(config.resources, region)
  }

  let decision: ResponseDecision | null = null
  switch (state) {
    case 'cooldown':
      decision = blended(config, region, 'cooldown_check_in', 'watchful', false)
      break
    case 'watchful':
      decision = blended(config, region, 'watchful_footer', 'watchful', true)
      break
    case 'normal': {
      const directive = styleDirective(config, 'normal')
      if (directive) {
        decision = {
          strategy: 'generative_passthrough',
          mustUseFixedPayload: false,
          allowGenerative: true,
          payloadId: null,
          region,
          styleDirective: directive,
        }
      }
      break
    }
  }

  if (!decision) {
    console.warn('[safety] arbiter could not resolve a payload, failing closed', { state, region })
    return fixedSafety(config.resources, region)
  }
  return decision
}
