/**
 * XState machine for our own occupant in one MUC room.
 *
 * One actor per joined room. The room record's `rosterReceived` and
 * `selfNickChangePending` flags mirror its snapshot.
 *
 * ## State Diagram
 *
 * ```
 *              SELF_UNAVAILABLE (303)
 * ┌─────────┐ ─────────────────────► ┌──────────────┐
 * │ present │                        │ changingNick │
 * └────┬────┘ ◄───────────────────── └──────┬───────┘
 *      │        SELF_AVAILABLE (new nick)    │
 *      │ SELF_UNAVAILABLE                    │ SELF_UNAVAILABLE
 *      ▼                                     ▼
 * ┌──────────────────────────────────────────────┐
 * │                 left (final)                 │
 * └──────────────────────────────────────────────┘
 * ```
 *
 * `rosterReceived` lives in context: the first SELF_AVAILABLE seen in
 * `present` sets it and takes its nick, and nothing clears it. A SELF_AVAILABLE that
 * completes a nick change leaves it untouched, so a nick change during
 * the join burst still ends with exactly one roster completion.
 *
 * @module Core/RoomSelfMachine
 */
import { setup, assign, type ActorRefFrom, type SnapshotFrom } from 'xstate'

export type RoomSelfEvent =
  | { type: 'SELF_AVAILABLE'; nick: string }
  | { type: 'SELF_UNAVAILABLE'; nickChange: boolean }

export interface RoomSelfContext {
  nick: string
  rosterReceived: boolean
}

export interface RoomSelfInput {
  nick: string
  /** Restores a room whose roster already arrived */
  rosterReceived?: boolean
}

export type RoomSelfStateValue = 'present' | 'changingNick' | 'left'

export const roomSelfMachine = setup({
  types: {
    context: {} as RoomSelfContext,
    events: {} as RoomSelfEvent,
    input: {} as RoomSelfInput,
  },
  actions: {
    markRosterReceived: assign({ rosterReceived: true }),

    applyNick: assign(({ event }) => {
      if (event.type === 'SELF_AVAILABLE') {
        return { nick: event.nick }
      }
      return {}
    }),
  },
  guards: {
    rosterPending: ({ context }) => !context.rosterReceived,

    isNickChange: ({ event }) => event.type === 'SELF_UNAVAILABLE' && event.nickChange,
  },
}).createMachine({
  id: 'roomSelf',
  context: ({ input }) => ({
    nick: input.nick,
    rosterReceived: input.rosterReceived ?? false,
  }),
  initial: 'present',
  states: {
    present: {
      on: {
        // Steady-state self presence after the roster is in: no transition
        // The first self presence carries the nick the room gave us
        SELF_AVAILABLE: {
          guard: 'rosterPending',
          actions: ['markRosterReceived', 'applyNick'],
        },
        SELF_UNAVAILABLE: [
          {
            guard: 'isNickChange',
            target: 'changingNick',
          },
          {
            target: 'left',
          },
        ],
      },
    },

    changingNick: {
      on: {
        SELF_AVAILABLE: {
          target: 'present',
          actions: 'applyNick',
        },
        // A repeated 303 keeps waiting; a plain unavailable abandons the change
        SELF_UNAVAILABLE: {
          guard: ({ event }) => !event.nickChange,
          target: 'left',
        },
      },
    },

    left: {
      type: 'final',
    },
  },
})

export type RoomSelfActor = ActorRefFrom<typeof roomSelfMachine>
export type RoomSelfSnapshot = SnapshotFrom<typeof roomSelfMachine>

/**
 * Narrow a snapshot's state value.
 */
export function getRoomSelfState(snapshot: RoomSelfSnapshot): RoomSelfStateValue {
  if (snapshot.matches('changingNick')) return 'changingNick'
  if (snapshot.matches('left')) return 'left'
  return 'present'
}
