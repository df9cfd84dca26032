/**
 * Core type definitions for the Palaver SDK.
 *
 * @packageDocumentation
 * @module Types
 */

// Inbound stanza types
export type {
  StanzaElement,
  PresenceType,
  CapsAdvertisement,
  MucUserPayload,
  PresenceDocument,
  OutboundStanza,
} from './stanza'

// Contact presence types
export type {
  ResourcePresence,
  CapsKey,
  Resource,
  DiscoQuery,
  CapsCache,
  SubscriptionKind,
  ContactPresence,
} from './presence'

// Room types
export type { RoomOccupant, RoomPresenceState, RoomRegistry } from './room'

// SDK events
export type {
  ConnectionEvents,
  ContactEvents,
  SubscriptionEvents,
  RoomEvents,
  CapsEvents,
  ConsoleEvents,
  SDKEvents,
  SDKEventHandler,
} from './sdk-events'
