// Presence engine
export { PresenceClient } from './PresenceClient'
export type { PresenceClientOptions } from './PresenceClient'

// Modules
export { BaseModule } from './modules/BaseModule'
export type { ModuleDependencies } from './modules/BaseModule'
export { Roster } from './modules/Roster'
export { MUC } from './modules/MUC'
export type { JoinRoomOptions } from './modules/MUC'

// Building blocks for custom dispatch
export { parsePresence, parsePresenceType, parsePriority, presenceFromShow } from './stanza'
export { classifyPresence, isAvailableContactPresence } from './presenceRouting'
export type { PresenceRoute } from './presenceRouting'
export { resolveCapsKey, buildDiscoInfoQuery, capsKeyId, CapsResolver, MemoryCapsCache } from './caps'
export type { CapsResolution, CapsResolverDeps } from './caps'
export { SubscriptionRequests } from './subscriptionRequests'
export { roomSelfMachine, getRoomSelfState } from './roomSelfMachine'
export type { RoomSelfActor, RoomSelfEvent, RoomSelfSnapshot, RoomSelfStateValue } from './roomSelfMachine'
export { ownPresenceChildren } from './ownPresence'
export type { OwnPresenceState, OwnPresenceOptions } from './ownPresence'

// JID helpers
export { parseJid, getBareJid, getResource, createFullJid, isSameBareJid } from './jid'
export type { ParsedJid } from './jid'

// Configuration
export {
  SUPPORTED_CAPS_HASH,
  DISCO_QUERY_ID,
  LEGACY_DISCO_ID_PREFIX,
  CAPS_NODE,
  DEFAULT_PRIORITY,
  priorityFor,
} from './config'
export type { OwnPresence, PriorityConfig } from './config'

export * from './namespaces'

// Re-export xml builder from @xmpp/client for raw stanza construction
export { xml } from '@xmpp/client'

// Types
export type {
  StanzaElement,
  PresenceType,
  CapsAdvertisement,
  MucUserPayload,
  PresenceDocument,
  OutboundStanza,
  ResourcePresence,
  CapsKey,
  Resource,
  DiscoQuery,
  CapsCache,
  SubscriptionKind,
  ContactPresence,
  RoomOccupant,
  RoomPresenceState,
  RoomRegistry,
  SDKEvents,
  SDKEventHandler,
} from './types'
