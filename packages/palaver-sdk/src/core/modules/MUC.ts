import { xml } from '@xmpp/client'
import { createActor } from 'xstate'
import { BaseModule } from './BaseModule'
import { createFullJid, getBareJid, parseJid } from '../jid'
import { NS_MUC } from '../namespaces'
import { ownPresenceChildren } from '../ownPresence'
import { presenceFromShow } from '../stanza'
import {
  roomSelfMachine,
  getRoomSelfState,
  type RoomSelfActor,
  type RoomSelfEvent,
} from '../roomSelfMachine'
import type { MucUserPayload, OutboundStanza, PresenceDocument, RoomOccupant, RoomPresenceState } from '../types'
import { logInfo, logWarn } from '../logger'

/**
 * Options for joining a room.
 */
export interface JoinRoomOptions {
  password?: string
  /** XEP-0045 `<history maxstanzas=…/>` */
  maxHistory?: number
}

/**
 * Multi-User Chat (MUC) presence module.
 *
 * Implements the XEP-0045 occupant presence protocol for joined rooms:
 * - Initial roster burst, completed by our own presence (status 110)
 * - Members joining, leaving and changing show/status
 * - Nickname changes (status 303), ours and other occupants'
 * - Leaving the room
 *
 * @remarks
 * Room presence must be handled in arrival order per room: a nick change
 * is an unavailable-303 presence followed by an available presence from
 * the new nick, and only the pair together is a rename.
 *
 * Occupant removal after `room:member-offline` is left to the consumer
 * (the store bindings do it); the module only inserts and renames.
 *
 * @example
 * ```typescript
 * await client.muc.joinRoom('room@conference.example.com', 'alice')
 * await client.muc.changeNick('room@conference.example.com', 'alice2')
 * await client.muc.leaveRoom('room@conference.example.com')
 * ```
 *
 * @category Modules
 */
export class MUC extends BaseModule {
  /** Self-occupant lifecycle per joined room */
  private selfActors = new Map<string, RoomSelfActor>()

  /**
   * Presence carrying a muc#user extension.
   */
  handleRoomPresence(presence: PresenceDocument): void {
    const muc = presence.muc
    if (!muc || presence.type === 'error') return

    const { bare: roomJid, resource: nick } = parseJid(presence.from)
    if (!nick) {
      this.trace('muc', `Ignoring room-level presence from ${roomJid}`)
      return
    }

    const room = this.deps.rooms.getRoom(roomJid)
    if (!room) {
      this.trace('muc', `Ignoring presence for room not joined: ${roomJid}`)
      return
    }

    if (this.isSelfPresence(room, presence.from, muc)) {
      this.handleSelfPresence(room, nick, presence, muc)
    } else {
      this.handleMemberPresence(room, nick, presence, muc)
    }
  }

  private isSelfPresence(room: RoomPresenceState, from: string, muc: MucUserPayload): boolean {
    if (muc.isSelf) return true
    if (from === createFullJid(room.jid, room.nick)) return true
    return room.selfNickChangePending && room.requestedNick !== null && from === createFullJid(room.jid, room.requestedNick)
  }

  private handleSelfPresence(room: RoomPresenceState, nick: string, presence: PresenceDocument, muc: MucUserPayload): void {
    let event: RoomSelfEvent
    if (presence.type === 'unavailable') {
      event = { type: 'SELF_UNAVAILABLE', nickChange: muc.isNickChange }
    } else if (presence.type === 'available') {
      event = { type: 'SELF_AVAILABLE', nick }
    } else {
      this.trace('muc', `Ignoring self presence of type ${presence.type} in ${room.jid}`)
      return
    }

    const actor = this.selfActor(room)
    const before = actor.getSnapshot()
    actor.send(event)
    const after = actor.getSnapshot()

    const beforeState = getRoomSelfState(before)
    const afterState = getRoomSelfState(after)

    if (afterState === 'left') {
      this.forgetRoom(room.jid)
      logInfo(`Room left: ${room.jid}`)
      this.deps.emitSDK('room:left', { roomJid: room.jid })
      return
    }

    const updates: Partial<RoomPresenceState> = {
      nick: after.context.nick,
      rosterReceived: after.context.rosterReceived,
      selfNickChangePending: afterState === 'changingNick',
    }
    if (afterState === 'changingNick' && beforeState !== 'changingNick') {
      // The 303 item names the nick the room will confirm
      updates.requestedNick = muc.newNick ?? room.requestedNick
    } else if (beforeState === 'changingNick' && afterState === 'present') {
      updates.requestedNick = null
    }
    this.deps.rooms.updateRoom(room.jid, updates)

    if (beforeState === 'changingNick' && afterState === 'present') {
      this.deps.emitSDK('room:nick-changed', { roomJid: room.jid, nick: after.context.nick })
    } else if (!before.context.rosterReceived && after.context.rosterReceived) {
      const occupantCount = this.deps.rooms.getRoom(room.jid)?.occupants.size ?? 0
      logInfo(`Room roster complete: ${room.jid} (${occupantCount} other occupants)`)
      this.deps.emitSDK('room:roster-complete', { roomJid: room.jid })
    } else if (afterState === 'changingNick' && beforeState !== 'changingNick') {
      this.trace('muc', `Own nickname change pending in ${room.jid}`)
    }
  }

  private handleMemberPresence(room: RoomPresenceState, nick: string, presence: PresenceDocument, muc: MucUserPayload): void {
    const roomJid = room.jid
    const rooms = this.deps.rooms
    const capsKey = this.deps.resolveCaps(presence)

    if (presence.type === 'unavailable') {
      if (muc.isNickChange && muc.newNick) {
        rooms.setPendingNickChange(roomJid, nick, muc.newNick)
        this.trace('muc', `Nickname change pending in ${roomJid}: ${nick} -> ${muc.newNick}`)
        return
      }
      rooms.dropPendingNickChangesFrom(roomJid, nick)
      this.deps.emitSDK('room:member-offline', {
        roomJid,
        nick,
        reason: 'offline',
        status: presence.status,
      })
      return
    }

    if (presence.type !== 'available') {
      this.trace('muc', `Ignoring member presence of type ${presence.type} in ${roomJid}`)
      return
    }

    const occupant: RoomOccupant = {
      nick,
      presence: presenceFromShow(presence.show),
      status: presence.status,
      capsKey,
    }

    // Join burst: occupants are recorded silently, roster-complete covers them
    if (!room.rosterReceived) {
      rooms.upsertOccupant(roomJid, occupant)
      return
    }

    const oldNick = rooms.takePendingNickChange(roomJid, nick)
    if (oldNick !== undefined) {
      rooms.renameOccupant(roomJid, oldNick, occupant)
      this.deps.emitSDK('room:member-nick-changed', { roomJid, oldNick, newNick: nick })
      return
    }

    const isNew = !room.occupants.has(nick)
    rooms.upsertOccupant(roomJid, occupant)
    this.deps.emitSDK(isNew ? 'room:member-online' : 'room:member-presence', {
      roomJid,
      nick,
      presence: occupant.presence,
      status: occupant.status,
      capsKey,
    })
  }

  private selfActor(room: RoomPresenceState): RoomSelfActor {
    const existing = this.selfActors.get(room.jid)
    if (existing) return existing

    // Registry record created outside joinRoom(): pick up its state
    const actor = createActor(roomSelfMachine, {
      input: { nick: room.nick, rosterReceived: room.rosterReceived },
    })
    actor.start()
    if (room.selfNickChangePending) {
      actor.send({ type: 'SELF_UNAVAILABLE', nickChange: true })
    }
    this.selfActors.set(room.jid, actor)
    return actor
  }

  /**
   * An error presence from a room. A refused join (nick conflict, members
   * only, bad password) drops the half-made record so the join can be
   * retried; errors in a room we are already in change nothing.
   *
   * @returns whether a pending join was abandoned
   */
  handleRoomError(from: string): boolean {
    const roomJid = getBareJid(from)
    const room = this.deps.rooms.getRoom(roomJid)
    if (!room || room.rosterReceived) return false

    this.forgetRoom(roomJid)
    logWarn(`Join refused by ${roomJid}`)
    return true
  }

  private forgetRoom(roomJid: string): void {
    this.selfActors.get(roomJid)?.stop()
    this.selfActors.delete(roomJid)
    this.deps.rooms.removeRoom(roomJid)
  }

  // --- Outgoing Room Presence Methods ---

  /**
   * Join a room: create its registry record and send the join presence
   * with our current show, status, priority and caps.
   *
   * Does nothing when a record for the room already exists.
   */
  async joinRoom(roomJid: string, nick: string, options: JoinRoomOptions = {}): Promise<void> {
    const bareRoomJid = getBareJid(roomJid)
    if (this.deps.rooms.getRoom(bareRoomJid)) {
      logWarn(`Already joined or joining ${bareRoomJid}`)
      return
    }

    this.deps.rooms.createRoom(bareRoomJid, nick)
    const actor = createActor(roomSelfMachine, { input: { nick } })
    actor.start()
    this.selfActors.set(bareRoomJid, actor)

    const mucChildren: OutboundStanza[] = []
    if (options.password) {
      mucChildren.push(xml('password', {}, options.password))
    }
    if (options.maxHistory !== undefined) {
      mucChildren.push(xml('history', { maxstanzas: String(options.maxHistory) }))
    }

    const presence = xml(
      'presence',
      { to: createFullJid(bareRoomJid, nick) },
      xml('x', { xmlns: NS_MUC }, ...mucChildren),
      ...ownPresenceChildren(this.deps.getOwnPresence(), {
        priorities: this.deps.priorities,
        capsVer: this.deps.capsVer,
      })
    )

    logInfo(`Joining room ${bareRoomJid}`)
    try {
      await this.deps.sendStanza(presence)
    } catch (err) {
      this.forgetRoom(bareRoomJid)
      throw err
    }
  }

  /**
   * Ask the room for a new nickname. The change completes when the room
   * answers with our unavailable-303 and available presences.
   */
  async changeNick(roomJid: string, nick: string): Promise<void> {
    const bareRoomJid = getBareJid(roomJid)
    const room = this.deps.rooms.getRoom(bareRoomJid)
    if (!room) {
      logWarn(`Cannot change nickname in ${bareRoomJid}: not joined`)
      return
    }

    this.deps.rooms.updateRoom(bareRoomJid, { requestedNick: nick })
    const presence = xml(
      'presence',
      { to: createFullJid(bareRoomJid, nick) },
      ...ownPresenceChildren(this.deps.getOwnPresence(), {
        priorities: this.deps.priorities,
        capsVer: this.deps.capsVer,
      })
    )
    this.trace('muc', `Requesting nickname ${nick} in ${bareRoomJid}`)
    await this.deps.sendStanza(presence)
  }

  /**
   * Send the leave presence. The room record goes away when the room
   * confirms with our unavailable presence.
   */
  async leaveRoom(roomJid: string, status?: string): Promise<void> {
    const bareRoomJid = getBareJid(roomJid)
    const room = this.deps.rooms.getRoom(bareRoomJid)
    if (!room) return

    const presence = xml(
      'presence',
      { to: createFullJid(bareRoomJid, room.nick), type: 'unavailable' },
      ...(status ? [xml('status', {}, status)] : [])
    )
    logInfo(`Leaving room ${bareRoomJid}`)
    await this.deps.sendStanza(presence)
  }

  /**
   * Full JIDs of our occupants in every room we are in, for directed
   * presence broadcasts.
   */
  occupantJids(): string[] {
    return this.deps.rooms.getRooms().map((room) => createFullJid(room.jid, room.nick))
  }

  /**
   * Drop session state: stop every self-occupant actor and remove the
   * room records they belong to.
   */
  reset(): void {
    for (const roomJid of Array.from(this.selfActors.keys())) {
      this.forgetRoom(roomJid)
    }
  }
}
