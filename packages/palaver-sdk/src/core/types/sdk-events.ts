/**
 * SDK event types.
 *
 * Every state change the engine derives from inbound presence is published
 * as one of these events. Store bindings subscribe to them to update the
 * zustand stores; bots and other front ends can subscribe directly.
 *
 * @packageDocumentation
 * @module Types/SDKEvents
 */

import type { CapsKey, Resource, ResourcePresence, SubscriptionKind } from './presence'
import type { XMPPStanzaError } from '../../utils/xmppError'

// ============================================================================
// Connection Events
// ============================================================================

export interface ConnectionEvents {
  /** A presence of type error arrived (handled by the connection layer) */
  'connection:presence-error': {
    jid: string
    error: XMPPStanzaError | null
    message: string
  }
}

// ============================================================================
// Contact Events (1:1 presence)
// ============================================================================

export interface ContactEvents {
  /** A contact resource became available or changed its presence */
  'contact:online': {
    jid: string
    resource: Resource
    lastActivity: Date | null
  }

  /** A contact resource went unavailable */
  'contact:offline': {
    jid: string
    resource: string | null
    status: string | null
  }
}

// ============================================================================
// Subscription Events
// ============================================================================

export interface SubscriptionEvents {
  /** Inbound subscription request awaiting approval */
  'subscription:request': {
    jid: string
  }

  /** Peer answered a subscription (ours or theirs) */
  'subscription:resolved': {
    jid: string
    kind: Exclude<SubscriptionKind, 'subscribe'>
  }

  /** We answered a pending request, which is no longer pending */
  'subscription:answered': {
    jid: string
    kind: SubscriptionKind
  }
}

// ============================================================================
// Room Events (MUC)
// ============================================================================

export interface RoomEvents {
  /** We left the room (self unavailable without nick change) */
  'room:left': {
    roomJid: string
  }

  /** Our nickname change was confirmed */
  'room:nick-changed': {
    roomJid: string
    nick: string
  }

  /** Initial occupant burst finished (first self-presence after join) */
  'room:roster-complete': {
    roomJid: string
  }

  'room:member-online': {
    roomJid: string
    nick: string
    presence: ResourcePresence
    status: string | null
    capsKey: CapsKey | null
  }

  'room:member-offline': {
    roomJid: string
    nick: string
    reason: 'offline'
    status: string | null
  }

  'room:member-nick-changed': {
    roomJid: string
    oldNick: string
    newNick: string
  }

  /** Show/status change of an occupant already in the roster */
  'room:member-presence': {
    roomJid: string
    nick: string
    presence: ResourcePresence
    status: string | null
    capsKey: CapsKey | null
  }
}

// ============================================================================
// Capability Events
// ============================================================================

export interface CapsEvents {
  /** A disco#info query was sent for an uncached caps key */
  'caps:query-sent': {
    key: CapsKey
    id: string
    to: string
    node: string
  }
}

// ============================================================================
// Console Events
// ============================================================================

export interface ConsoleEvents {
  /** Protocol trace for debug consoles */
  'console:event': {
    message: string
    category: 'presence' | 'muc' | 'caps' | 'subscription'
  }
}

/**
 * All SDK events, keyed by name.
 */
export interface SDKEvents
  extends ConnectionEvents,
    ContactEvents,
    SubscriptionEvents,
    RoomEvents,
    CapsEvents,
    ConsoleEvents {}

export type SDKEventHandler<K extends keyof SDKEvents> = (payload: SDKEvents[K]) => void
