/**
 * Presence classification.
 *
 * One ordered match decides which handler owns an inbound presence. The
 * order is the contract; the first rule that matches wins:
 *
 * 1. `type='error'`                  → error (connection layer)
 * 2. carries muc#user                → room
 * 3. `type='unavailable'`            → unavailable (contact offline)
 * 4. `type='subscribe'`              → subscribe
 * 5. `type='subscribed'|'unsubscribed'` → subscription-resolved
 * 6. no type                         → available (contact online)
 * 7. anything else                   → ignored
 *
 * @module Core/PresenceRouting
 */

import type { PresenceDocument } from './types'

export type PresenceRoute =
  | { kind: 'error' }
  | { kind: 'room' }
  | { kind: 'unavailable' }
  | { kind: 'subscribe' }
  | { kind: 'subscription-resolved'; resolution: 'subscribed' | 'unsubscribed' }
  | { kind: 'available' }
  | { kind: 'ignored'; reason: string }

export function classifyPresence(presence: PresenceDocument): PresenceRoute {
  if (presence.type === 'error') return { kind: 'error' }
  if (presence.muc) return { kind: 'room' }

  switch (presence.type) {
    case 'unavailable':
      return { kind: 'unavailable' }
    case 'subscribe':
      return { kind: 'subscribe' }
    case 'subscribed':
    case 'unsubscribed':
      return { kind: 'subscription-resolved', resolution: presence.type }
    case 'available':
      return { kind: 'available' }
    default:
      return { kind: 'ignored', reason: `presence type ${presence.type}` }
  }
}

/**
 * Whether a presence is plain available contact presence. The available
 * handler checks this itself so a stray call with any other stanza does
 * nothing.
 */
export function isAvailableContactPresence(presence: PresenceDocument): boolean {
  return presence.type === 'available' && presence.muc === null
}
