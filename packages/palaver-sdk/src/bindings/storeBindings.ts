/**
 * Store bindings - wire SDK events to Zustand store updates.
 *
 * Modules never touch the contact store: they emit events, and these
 * bindings translate them into store updates. Bots that want no stores
 * skip the bindings and subscribe to the events directly.
 *
 * The room store is the exception on the write side: the MUC module keeps
 * its occupant table through the {@link RoomRegistry} interface, so only
 * departures are applied here.
 *
 * @packageDocumentation
 * @module Bindings
 */

import type { PresenceClient } from '../core/PresenceClient'
import type { RoomRegistry } from '../core/types'
import type { contactStore } from '../stores'

/**
 * Store references for binding SDK events.
 * Uses the vanilla Zustand store getState() pattern.
 */
export interface StoreRefs {
  contact: ReturnType<typeof contactStore.getState>
  room: RoomRegistry
}

/**
 * Unsubscribe function returned by createStoreBindings.
 */
export type UnsubscribeBindings = () => void

/**
 * Create store bindings that wire SDK events to Zustand stores.
 *
 * @param client - The PresenceClient instance to bind
 * @param getStores - Function that returns current store state (called lazily)
 * @returns Unsubscribe function to remove all bindings
 *
 * @example
 * ```typescript
 * const unsubscribe = createStoreBindings(client, () => ({
 *   contact: contactStore.getState(),
 *   room: roomStore.getState(),
 * }))
 *
 * // On disconnect
 * unsubscribe()
 * ```
 */
export function createStoreBindings(
  client: PresenceClient,
  getStores: () => StoreRefs
): UnsubscribeBindings {
  const unsubscribers: Array<() => void> = []

  // Helper to subscribe and track for cleanup
  const on = <K extends Parameters<typeof client.subscribe>[0]>(
    event: K,
    handler: Parameters<typeof client.subscribe<K>>[1]
  ) => {
    const unsub = client.subscribe(event, handler)
    unsubscribers.push(unsub)
  }

  // ============================================================================
  // Contact Events
  // ============================================================================

  on('contact:online', ({ jid, resource, lastActivity }) => {
    const stores = getStores()
    stores.contact.applyOnline(jid, resource, lastActivity)
  })

  on('contact:offline', ({ jid, resource, status }) => {
    const stores = getStores()
    stores.contact.applyOffline(jid, resource, status)
  })

  // ============================================================================
  // Subscription Events
  // ============================================================================

  on('subscription:request', ({ jid }) => {
    const stores = getStores()
    stores.contact.addSubscriptionRequest(jid)
  })

  on('subscription:resolved', ({ jid }) => {
    const stores = getStores()
    stores.contact.removeSubscriptionRequest(jid)
  })

  on('subscription:answered', ({ jid }) => {
    const stores = getStores()
    stores.contact.removeSubscriptionRequest(jid)
  })

  // ============================================================================
  // Room Events
  // ============================================================================

  on('room:member-offline', ({ roomJid, nick }) => {
    const stores = getStores()
    stores.room.removeOccupant(roomJid, nick)
  })

  // Already gone from the registry the client uses; this covers a
  // separate registry passed in here
  on('room:left', ({ roomJid }) => {
    const stores = getStores()
    stores.room.removeRoom(roomJid)
  })

  return () => {
    for (const unsub of unsubscribers) {
      unsub()
    }
  }
}
