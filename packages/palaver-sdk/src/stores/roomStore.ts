import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'
import type { RoomOccupant, RoomPresenceState, RoomRegistry } from '../core/types'

/**
 * Room registry state.
 *
 * Holds the presence record of every room we joined: our nickname, the
 * roster-burst and nick-change flags, the occupant table and pending
 * occupant renames. The MUC module mutates it through the
 * {@link RoomRegistry} actions; UIs subscribe to it.
 *
 * @remarks
 * Every mutation replaces the touched `Map`s and room objects, so
 * selectors can compare by reference.
 *
 * @example
 * ```ts
 * import { roomStore } from '@palaver/sdk'
 *
 * roomStore.subscribe(
 *   (state) => state.rooms.get('room@conference.example.com')?.occupants,
 *   (occupants) => render(occupants)
 * )
 * ```
 *
 * @category Stores
 */
export interface RoomState extends RoomRegistry {
  rooms: Map<string, RoomPresenceState>
  reset: () => void
}

function withRoom(
  rooms: Map<string, RoomPresenceState>,
  roomJid: string,
  update: (room: RoomPresenceState) => RoomPresenceState
): Map<string, RoomPresenceState> | null {
  const existing = rooms.get(roomJid)
  if (!existing) return null
  const newRooms = new Map(rooms)
  newRooms.set(roomJid, update(existing))
  return newRooms
}

export const roomStore = createStore<RoomState>()(
  subscribeWithSelector((set, get) => {
    // Apply an update to one room; unknown rooms are left alone
    const updateRoomWith = (roomJid: string, update: (room: RoomPresenceState) => RoomPresenceState) => {
      set((state) => {
        const rooms = withRoom(state.rooms, roomJid, update)
        return rooms ? { rooms } : state
      })
    }

    return {
      rooms: new Map(),

      getRoom: (roomJid) => get().rooms.get(roomJid),

      getRooms: () => Array.from(get().rooms.values()),

      createRoom: (roomJid, nick) => {
        set((state) => {
          const rooms = new Map(state.rooms)
          rooms.set(roomJid, {
            jid: roomJid,
            nick,
            requestedNick: null,
            rosterReceived: false,
            selfNickChangePending: false,
            occupants: new Map(),
            pendingNickChanges: new Map(),
          })
          return { rooms }
        })
      },

      updateRoom: (roomJid, updates) => {
        updateRoomWith(roomJid, (room) => ({ ...room, ...updates }))
      },

      removeRoom: (roomJid) => {
        set((state) => {
          if (!state.rooms.has(roomJid)) return state
          const rooms = new Map(state.rooms)
          rooms.delete(roomJid)
          return { rooms }
        })
      },

      upsertOccupant: (roomJid, occupant) => {
        updateRoomWith(roomJid, (room) => {
          const occupants = new Map(room.occupants)
          occupants.set(occupant.nick, occupant)
          return { ...room, occupants }
        })
      },

      renameOccupant: (roomJid, oldNick, occupant) => {
        updateRoomWith(roomJid, (room) => {
          const occupants = new Map(room.occupants)
          occupants.delete(oldNick)
          occupants.set(occupant.nick, occupant)
          return { ...room, occupants }
        })
      },

      removeOccupant: (roomJid, nick) => {
        updateRoomWith(roomJid, (room) => {
          if (!room.occupants.has(nick)) return room
          const occupants = new Map(room.occupants)
          occupants.delete(nick)
          return { ...room, occupants }
        })
      },

      setPendingNickChange: (roomJid, oldNick, newNick) => {
        updateRoomWith(roomJid, (room) => {
          const pendingNickChanges = new Map(room.pendingNickChanges)
          pendingNickChanges.set(newNick, oldNick)
          return { ...room, pendingNickChanges }
        })
      },

      takePendingNickChange: (roomJid, newNick) => {
        const oldNick = get().rooms.get(roomJid)?.pendingNickChanges.get(newNick)
        if (oldNick === undefined) return undefined

        updateRoomWith(roomJid, (room) => {
          const pendingNickChanges = new Map(room.pendingNickChanges)
          pendingNickChanges.delete(newNick)
          return { ...room, pendingNickChanges }
        })
        return oldNick
      },

      dropPendingNickChangesFrom: (roomJid, oldNick) => {
        updateRoomWith(roomJid, (room) => {
          const stale = Array.from(room.pendingNickChanges).filter(([, from]) => from === oldNick)
          if (stale.length === 0) return room
          const pendingNickChanges = new Map(room.pendingNickChanges)
          for (const [newNick] of stale) {
            pendingNickChanges.delete(newNick)
          }
          return { ...room, pendingNickChanges }
        })
      },

      reset: () => set({ rooms: new Map() }),
    }
  })
)

/**
 * Occupants of a room sorted by nickname, or an empty list for unknown rooms.
 */
export function selectOccupants(state: RoomState, roomJid: string): RoomOccupant[] {
  const room = state.rooms.get(roomJid)
  if (!room) return []
  return Array.from(room.occupants.values()).sort((a, b) => a.nick.localeCompare(b.nick))
}
