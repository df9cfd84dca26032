/**
 * Multi-user chat presence types.
 *
 * @packageDocumentation
 * @module Types/Room
 */

import type { CapsKey, ResourcePresence } from './presence'

export interface RoomOccupant {
  nick: string
  presence: ResourcePresence
  status: string | null
  capsKey: CapsKey | null
}

/**
 * Per-room presence record kept by the room registry.
 *
 * `rosterReceived` and `selfNickChangePending` mirror the room's
 * self-occupant state machine; modules update them, consumers read them.
 */
export interface RoomPresenceState {
  jid: string
  /** Our current nickname in the room */
  nick: string
  /** Nickname we asked for with a nick change that the room has not confirmed */
  requestedNick: string | null
  rosterReceived: boolean
  selfNickChangePending: boolean
  occupants: Map<string, RoomOccupant>
  /** One-shot renames announced by a 303 presence: new nick → old nick */
  pendingNickChanges: Map<string, string>
}

/**
 * Mutations the MUC module performs on the room registry.
 */
export interface RoomRegistry {
  getRoom(roomJid: string): RoomPresenceState | undefined
  getRooms(): RoomPresenceState[]
  createRoom(roomJid: string, nick: string): void
  updateRoom(roomJid: string, updates: Partial<Pick<RoomPresenceState, 'nick' | 'requestedNick' | 'rosterReceived' | 'selfNickChangePending'>>): void
  removeRoom(roomJid: string): void
  upsertOccupant(roomJid: string, occupant: RoomOccupant): void
  renameOccupant(roomJid: string, oldNick: string, occupant: RoomOccupant): void
  removeOccupant(roomJid: string, nick: string): void
  setPendingNickChange(roomJid: string, oldNick: string, newNick: string): void
  /** Remove and return the old nick recorded for `newNick`, if any */
  takePendingNickChange(roomJid: string, newNick: string): string | undefined
  /** Drop pending renames that start from `oldNick` */
  dropPendingNickChangesFrom(roomJid: string, oldNick: string): void
}
