/**
 * # Palaver SDK
 *
 * Presence engine for XMPP clients: contact availability, subscription
 * requests, multi-user chat occupant tracking and entity capability
 * discovery.
 *
 * ## Bundle Structure
 *
 * - **`@palaver/sdk`** - Everything below
 * - **`@palaver/sdk/core`** - PresenceClient, modules, types (no stores)
 * - **`@palaver/sdk/stores`** - Direct Zustand store access
 *
 * ## Quick Start
 *
 * ```typescript
 * import { PresenceClient, createStoreBindings, contactStore, roomStore } from '@palaver/sdk'
 *
 * const client = new PresenceClient({
 *   sendStanza: (stanza) => xmpp.send(stanza),
 *   getCurrentJid: () => xmpp.jid?.toString() ?? null,
 * })
 * createStoreBindings(client, () => ({
 *   contact: contactStore.getState(),
 *   room: roomStore.getState(),
 * }))
 * xmpp.on('stanza', (stanza) => client.handleStanza(stanza))
 * ```
 *
 * @packageDocumentation
 * @module SDK
 */

export * from './core'

// Stores
export { roomStore, contactStore, selectOccupants, computeAggregatedPresence } from './stores'
export type { RoomState, ContactState } from './stores'

// Bindings
export { createStoreBindings } from './bindings/storeBindings'
export type { StoreRefs, UnsubscribeBindings } from './bindings/storeBindings'

// Errors
export { parseXMPPError, formatXMPPError } from './utils/xmppError'
export type { XMPPErrorType, XMPPStanzaError } from './utils/xmppError'
