/**
 * SDK Configuration Constants
 *
 * Protocol constants for capability discovery and defaults for outbound
 * presence.
 */

import type { ResourcePresence } from './types'

/**
 * The one XEP-0115 hash algorithm whose `ver` we trust as a shared cache key.
 * Any other (or missing) algorithm falls back to per-sender legacy keys.
 */
export const SUPPORTED_CAPS_HASH = 'sha-1'

/** IQ id of disco#info queries for hashed caps keys */
export const DISCO_QUERY_ID = 'disco'

/** IQ id prefix of disco#info queries for legacy caps; the sender JID follows */
export const LEGACY_DISCO_ID_PREFIX = 'disco_'

/** Node announced in our own `<c/>` element */
export const CAPS_NODE = 'urn:xmpp:palaver:caps'

/** Priority sent with our presence when no per-kind override is configured */
export const DEFAULT_PRIORITY = 50

/** Presence kinds we can announce for ourselves */
export type OwnPresence = Exclude<ResourcePresence, 'offline'>

/**
 * Per-kind priority overrides, e.g. a lower priority while away so
 * messages route to another connected device.
 */
export type PriorityConfig = Partial<Record<OwnPresence, number>>

export function priorityFor(show: OwnPresence, priorities: PriorityConfig = {}): number {
  return priorities[show] ?? DEFAULT_PRIORITY
}
