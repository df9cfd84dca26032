/**
 * Contact presence types.
 *
 * @packageDocumentation
 * @module Types/Presence
 */

/**
 * Presence of a single resource. `<show/>` values plus the implicit
 * `online` (no show) and `offline` (unavailable).
 */
export type ResourcePresence = 'online' | 'chat' | 'away' | 'xa' | 'dnd' | 'offline'

/**
 * Capability cache key.
 *
 * - `hashed`: XEP-0115 verification string. Entities announcing the same
 *   `ver` share one cache entry.
 * - `legacy`: no usable hash, so capabilities are tracked per sender JID.
 *
 * The two spaces are kept apart: a `ver` that happens to look like a JID
 * never matches a legacy entry.
 */
export type CapsKey =
  | { kind: 'hashed'; ver: string }
  | { kind: 'legacy'; jid: string }

/**
 * One JID resource's presence, built from a single available stanza.
 * Treat as immutable: a newer stanza produces a new value.
 */
export interface Resource {
  name: string
  presence: ResourcePresence
  status: string | null
  priority: number
  capsKey: CapsKey | null
}

/**
 * Disco#info request derived from a caps advertisement.
 */
export interface DiscoQuery {
  /** IQ id, used by the response handler to find the cache entry */
  id: string
  /** Entity to query (the presence sender) */
  to: string
  /** `node#ver` to ask about */
  node: string
}

/**
 * Membership check against the capability cache.
 * Inserting resolved entries is the job of the disco#info response handler.
 */
export interface CapsCache {
  contains(key: CapsKey): boolean
}

/**
 * Presence types that change a subscription.
 */
export type SubscriptionKind = 'subscribe' | 'subscribed' | 'unsubscribed'

/**
 * Aggregated view of a contact in the contact store.
 */
export interface ContactPresence {
  jid: string
  resources: Map<string, Resource>
  /** Presence of the winning resource, or `'offline'` without resources */
  presence: ResourcePresence
  status: string | null
  lastActivity: Date | null
  /** Status text of the last unavailable presence */
  offlineStatus: string | null
}
