import type { EscalationState, ResponseDecision, RiskTier } from '../safety/types.js'

export interface InlineButton {
  text: string
  /** callback_data, at most 64 bytes */
  data: string
}

export type Keyboard = InlineButton[][]

/** What the transport sends back for one inbound message. */
export interface OutgoingDirective {
  text: string
  /** Null for commands that never touched the safety core */
  decision: ResponseDecision | null
  state: EscalationState | null
  tier: RiskTier | null
  keyboard?: Keyboard
  degraded?: boolean
}
