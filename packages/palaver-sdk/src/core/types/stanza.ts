/**
 * Stanza shapes, inbound and outbound.
 *
 * @packageDocumentation
 * @module Types/Stanza
 */

import type { xml } from '@xmpp/client'

/**
 * The subset of an XML element the engine reads from inbound stanzas.
 *
 * Structurally compatible with the elements `@xmpp/client` delivers through
 * its `stanza` event, so transport code can hand those over directly.
 */
export interface StanzaElement {
  name: string
  attrs: Record<string, string | undefined>
  children: Array<StanzaElement | string>
  getChild(name: string, xmlns?: string): StanzaElement | undefined
  getChildren(name: string, xmlns?: string): StanzaElement[]
  getChildText(name: string, xmlns?: string): string | null
  getText(): string | null
}

/**
 * RFC 6121 presence `type` values. A stanza without a `type` attribute is
 * `'available'`; a value outside the RFC set becomes `'unknown'`.
 */
export type PresenceType =
  | 'available'
  | 'unavailable'
  | 'subscribe'
  | 'subscribed'
  | 'unsubscribe'
  | 'unsubscribed'
  | 'probe'
  | 'error'
  | 'unknown'

/**
 * XEP-0115 `<c/>` element attributes. Each may be missing on the wire.
 */
export interface CapsAdvertisement {
  hash: string | null
  node: string | null
  ver: string | null
}

/**
 * XEP-0045 `<x xmlns='…muc#user'/>` payload.
 */
export interface MucUserPayload {
  statusCodes: string[]
  /** Status 110: presence refers to our own occupant */
  isSelf: boolean
  /** Status 303: occupant leaves only to come back under `newNick` */
  isNickChange: boolean
  /** `<item nick=…/>` of a 303 presence */
  newNick: string | null
}

/**
 * A presence stanza reduced to the values the engine acts on.
 * Produced by `parsePresence()`; every field tolerates absence.
 */
export interface PresenceDocument {
  /** Sender JID as found in `from` (usually a full JID) */
  from: string
  type: PresenceType
  show: string | null
  status: string | null
  /** Raw `<priority/>` text; parsing happens where the value is used */
  priority: string | null
  /** Seconds from `<query xmlns='jabber:iq:last' seconds=…/>`, 0 when absent or invalid */
  idleSeconds: number
  /** XEP-0319 `<idle since=…/>`, when present and a valid date */
  idleSince: Date | null
  caps: CapsAdvertisement | null
  muc: MucUserPayload | null
}

/**
 * Element built with `xml()` from `@xmpp/client` for sending.
 */
export type OutboundStanza = ReturnType<typeof xml>
