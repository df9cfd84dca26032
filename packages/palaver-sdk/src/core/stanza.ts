/**
 * Presence stanza parsing.
 *
 * Turns an inbound `<presence/>` element into a {@link PresenceDocument}.
 * All inputs are untrusted network data: missing or malformed children
 * produce defaults, never exceptions.
 *
 * @module Core/Stanza
 */

import {
  NS_CAPS,
  NS_IDLE,
  NS_LAST_ACTIVITY,
  NS_MUC_USER,
  MUC_STATUS_NICK_CHANGE,
  MUC_STATUS_SELF_PRESENCE,
} from './namespaces'
import type {
  CapsAdvertisement,
  MucUserPayload,
  PresenceDocument,
  PresenceType,
  ResourcePresence,
  StanzaElement,
} from './types'

const PRESENCE_TYPES: ReadonlySet<string> = new Set<PresenceType>([
  'unavailable',
  'subscribe',
  'subscribed',
  'unsubscribe',
  'unsubscribed',
  'probe',
  'error',
])

function isPresenceType(value: string): value is PresenceType {
  return PRESENCE_TYPES.has(value)
}

export function parsePresenceType(type: string | undefined): PresenceType {
  if (type === undefined || type === '') return 'available'
  return isPresenceType(type) ? type : 'unknown'
}

/**
 * Map `<show/>` text to a resource presence. Absent or unrecognised values
 * mean plain `online`.
 */
export function presenceFromShow(show: string | null): ResourcePresence {
  switch (show) {
    case 'chat':
    case 'away':
    case 'xa':
    case 'dnd':
      return show
    default:
      return 'online'
  }
}

/**
 * Parse `<priority/>` text. Leading whitespace and trailing garbage are
 * tolerated ('5 ' → 5); anything without a leading integer is 0.
 */
export function parsePriority(text: string | null): number {
  if (text === null) return 0
  const value = parseInt(text, 10)
  return Number.isNaN(value) ? 0 : value
}

function parseIdleSeconds(stanza: StanzaElement): number {
  const query = stanza.getChild('query', NS_LAST_ACTIVITY)
  const seconds = query?.attrs.seconds
  if (seconds === undefined) return 0
  const value = parseInt(seconds, 10)
  return Number.isNaN(value) || value < 1 ? 0 : value
}

function parseIdleSince(stanza: StanzaElement): Date | null {
  const since = stanza.getChild('idle', NS_IDLE)?.attrs.since
  if (!since) return null
  const date = new Date(since)
  return Number.isNaN(date.getTime()) ? null : date
}

function parseCaps(stanza: StanzaElement): CapsAdvertisement | null {
  const c = stanza.getChild('c', NS_CAPS)
  if (!c) return null
  return {
    hash: c.attrs.hash || null,
    node: c.attrs.node || null,
    ver: c.attrs.ver || null,
  }
}

function parseMucUser(stanza: StanzaElement): MucUserPayload | null {
  const x = stanza.getChild('x', NS_MUC_USER)
  if (!x) return null

  const statusCodes = x
    .getChildren('status')
    .map((status) => status.attrs.code)
    .filter((code): code is string => typeof code === 'string')
  const isNickChange = statusCodes.includes(MUC_STATUS_NICK_CHANGE)

  return {
    statusCodes,
    isSelf: statusCodes.includes(MUC_STATUS_SELF_PRESENCE),
    isNickChange,
    newNick: isNickChange ? x.getChild('item')?.attrs.nick || null : null,
  }
}

// Empty elements (<status/>) count as absent
function childText(stanza: StanzaElement, name: string): string | null {
  return stanza.getChildText(name) || null
}

/**
 * Reduce a `<presence/>` element to a {@link PresenceDocument}.
 *
 * @returns null for non-presence elements and presences without `from`
 */
export function parsePresence(stanza: StanzaElement): PresenceDocument | null {
  if (stanza.name !== 'presence') return null
  const from = stanza.attrs.from
  if (!from) return null

  return {
    from,
    type: parsePresenceType(stanza.attrs.type),
    show: childText(stanza, 'show'),
    status: childText(stanza, 'status'),
    priority: childText(stanza, 'priority'),
    idleSeconds: parseIdleSeconds(stanza),
    idleSince: parseIdleSince(stanza),
    caps: parseCaps(stanza),
    muc: parseMucUser(stanza),
  }
}
