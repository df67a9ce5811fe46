import { describe, expect, it, vi } from 'vitest'
import { loadSafetyConfig } from '../config/loader.js'
import { decide, resolvePayload, type ArbiterConfig } from './response-arbiter.js'
import { RISK_TIERS, type RiskAssessment, type RiskTier } from './types.js'

const { resources, settings } = loadSafetyConfig()
const config: ArbiterConfig = { resources, styleDirectives: settings.styleDirectives }
const auCrisis = resources.regions.au.payloads.crisis

function assessment(tier: RiskTier): RiskAssessment {
  return {
    tier,
    reason: 'weak_signal',
    signals: [],
    aggregateScore: 0,
    heightenedSensitivity: false,
    assessedAt: '2026-10-01T12:00:00.000Z',
  }
}

describe('decide', () => {
  it('never allows generation in crisis', () => {
    for (const tier of RISK_TIERS) {
      const decision = decide('crisis', assessment(tier), config, 'au')
      expect(decision).toEqual({
        strategy: 'fixed_safety',
        mustUseFixedPayload: true,
        allowGenerative: false,
        payloadId: 'crisis',
        payload: auCrisis,
        region: 'au',
      })
    }
  })

  it('forces the fixed payload for a crisis tier in any state', () => {
    for (const state of ['normal', 'watchful', 'cooldown'] as const) {
      expect(decide(state, assessment('crisis'), config, 'us')).toMatchObject({
        strategy: 'fixed_safety',
        payload: resources.regions.us.payloads.crisis,
      })
    }
  })

  it('blends the cooldown check-in without generation', () => {
    const decision = decide('cooldown', assessment('none'), config, 'au')
    expect(decision).toMatchObject({
      strategy: 'supportive_blended',
      allowGenerative: false,
      payloadId: 'cooldown_check_in',
      payload: resources.regions.au.payloads.cooldown_check_in,
    })
  })

  it('allows generation in watchful with the watchful directive and footer', () => {
    const decision = decide('watchful', assessment('low'), config, 'au')
    expect(decision).toMatchObject({
      strategy: 'supportive_blended',
      allowGenerative: true,
      payloadId: 'watchful_footer',
      styleDirective: { id: 'watchful', instructions: settings.styleDirectives.watchful },
    })
  })

  it('passes normal conversations through with the normal directive', () => {
    expect(decide('normal', assessment('none'), config)).toEqual({
      strategy: 'generative_passthrough',
      mustUseFixedPayload: false,
      allowGenerative: true,
      payloadId: null,
      region: 'au',
      styleDirective: { id: 'normal', instructions: settings.styleDirectives.normal },
    })
  })

  it('falls back to the default region for an unknown one', () => {
    expect(decide('crisis', assessment('none'), config, 'zz')).toMatchObject({ region: 'au', payload: auCrisis })
  })

  it('borrows a missing blended payload from the default region', () => {
    expect(decide('watchful', assessment('none'), config, 'uk')).toMatchObject({
      region: 'uk',
      payload: resources.regions.au.payloads.watchful_footer,
    })
  })

  it('blends the payload of the requested region', () => {
    const uk = resources.regions.uk.payloads
    expect(decide('watchful', assessment('elevated'), config, 'uk')).toMatchObject({
      strategy: 'supportive_blended',
      payload: uk.watchful_footer,
      region: 'uk',
    })
    expect(decide('cooldown', assessment('none'), config, 'uk')).toMatchObject({
      strategy: 'supportive_blended',
      payload: uk.cooldown_check_in,
      region: 'uk',
    })
    expect(uk.watchful_footer).not.toContain('1800 55 1800')
  })

  it('fails closed when a directive cannot be resolved', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const noWatchful = { resources, styleDirectives: { normal: ['Be warm.'], watchful: [] } }
    expect(decide('watchful', assessment('none'), noWatchful, 'us')).toMatchObject({
      strategy: 'fixed_safety',
      payload: resources.regions.us.payloads.crisis,
    })
    const noDirectives = { resources, styleDirectives: { normal: [], watchful: [] } }
    expect(decide('normal', assessment('none'), noDirectives)).toMatchObject({ strategy: 'fixed_safety' })
    expect(warn).toHaveBeenCalledTimes(2)
    warn.mockRestore()
  })
})

describe('resolvePayload', () => {
  it('returns the configured text verbatim', () => {
    expect(resolvePayload(resources, 'au', 'check_in')).toBe(
      "Hey, just checking in. 🌱 How are you doing today? I'm here if you want to talk.",
    )
    expect(resolvePayload(resources, 'uk', 'watchful_footer')).toBe(resources.regions.uk.payloads.watchful_footer)
    expect(resolvePayload(resources, 'zz', 'crisis')).toBeNull()
  })
})
