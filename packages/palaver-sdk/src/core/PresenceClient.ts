import { xml } from '@xmpp/client'
import { CapsResolver, MemoryCapsCache } from './caps'
import type { OwnPresence, PriorityConfig } from './config'
import { logError, logInfo } from './logger'
import { MUC } from './modules/MUC'
import { Roster } from './modules/Roster'
import type { ModuleDependencies } from './modules/BaseModule'
import { ownPresenceChildren, type OwnPresenceState } from './ownPresence'
import { classifyPresence } from './presenceRouting'
import { parsePresence } from './stanza'
import { getBareJid } from './jid'
import { formatXMPPError, parseXMPPError } from '../utils/xmppError'
import { roomStore } from '../stores/roomStore'
import type {
  CapsCache,
  OutboundStanza,
  PresenceDocument,
  RoomRegistry,
  SDKEventHandler,
  SDKEvents,
  StanzaElement,
} from './types'

/**
 * Configuration for {@link PresenceClient}.
 */
export interface PresenceClientOptions {
  /** Hand an outbound stanza to the transport */
  sendStanza: (stanza: OutboundStanza) => Promise<void>
  /** Our full JID, or null before the session is bound */
  getCurrentJid: () => string | null
  /** Capability cache to check before sending disco#info; in-memory by default */
  capsCache?: CapsCache
  /** Room registry; the shared {@link roomStore} by default */
  rooms?: RoomRegistry
  /** Per-kind priority overrides for outbound presence */
  priorities?: PriorityConfig
  /** Our own XEP-0115 verification string */
  capsVer?: string
}

/**
 * Presence engine of an XMPP client session.
 *
 * Feed it every inbound stanza (non-presence stanzas are skipped); it
 * classifies presence, hands it to the owning module and publishes the
 * resulting state changes as typed SDK events.
 *
 * @example
 * ```typescript
 * const client = new PresenceClient({
 *   sendStanza: (stanza) => xmpp.send(stanza),
 *   getCurrentJid: () => xmpp.jid?.toString() ?? null,
 * })
 * createStoreBindings(client, () => ({
 *   contact: contactStore.getState(),
 *   room: roomStore.getState(),
 * }))
 *
 * xmpp.on('stanza', (stanza) => client.handleStanza(stanza))
 * await client.updatePresence('away', 'Lunch')
 * ```
 *
 * @category Core
 */
export class PresenceClient {
  /**
   * Contact presence and subscription module.
   */
  public readonly roster: Roster

  /**
   * Multi-User Chat (MUC) presence module.
   */
  public readonly muc: MUC

  private sdkEventHandlers: Map<keyof SDKEvents, Set<SDKEventHandler<keyof SDKEvents>>> = new Map()
  private caps: CapsResolver
  private ownPresence: OwnPresenceState = { show: 'online', status: null }
  private options: PresenceClientOptions

  constructor(options: PresenceClientOptions) {
    this.options = options

    this.caps = new CapsResolver({
      cache: options.capsCache ?? new MemoryCapsCache(),
      sendStanza: (stanza) => options.sendStanza(stanza),
      emitSDK: (event, payload) => this.emitSDK(event, payload),
    })

    const moduleDeps: ModuleDependencies = {
      sendStanza: (stanza) => options.sendStanza(stanza),
      getCurrentJid: () => options.getCurrentJid(),
      emitSDK: (event, payload) => this.emitSDK(event, payload),
      rooms: options.rooms ?? roomStore.getState(),
      resolveCaps: (presence) => this.caps.resolve(presence),
      getOwnPresence: () => this.ownPresence,
      priorities: options.priorities ?? {},
      capsVer: options.capsVer,
    }

    this.roster = new Roster(moduleDeps)
    this.muc = new MUC(moduleDeps)
  }

  /**
   * Subscribe to SDK events.
   *
   * @returns Unsubscribe function
   *
   * @example
   * ```typescript
   * client.subscribe('room:member-online', ({ roomJid, nick }) => {
   *   console.log(`${nick} joined ${roomJid}`)
   * })
   * ```
   */
  subscribe<K extends keyof SDKEvents>(event: K, handler: SDKEventHandler<K>): () => void {
    const handlers = this.sdkEventHandlers.get(event) ?? new Set<SDKEventHandler<keyof SDKEvents>>()
    this.sdkEventHandlers.set(event, handlers)
    handlers.add(handler as SDKEventHandler<keyof SDKEvents>)
    return () => {
      handlers.delete(handler as SDKEventHandler<keyof SDKEvents>)
    }
  }

  /**
   * Emit an SDK event with object payload.
   *
   * @internal Used by modules to emit events
   */
  emitSDK<K extends keyof SDKEvents>(event: K, payload: SDKEvents[K]): void {
    this.sdkEventHandlers.get(event)?.forEach((handler) => {
      ;(handler as SDKEventHandler<K>)(payload)
    })
  }

  /**
   * Process one inbound stanza.
   *
   * @returns true when the stanza was a presence that reached a handler
   */
  handleStanza(stanza: StanzaElement): boolean {
    try {
      const presence = parsePresence(stanza)
      if (!presence) return false
      return this.dispatch(presence, stanza)
    } catch (err) {
      logError(`Presence handler failed: ${err instanceof Error ? err.message : String(err)}`)
      return false
    }
  }

  private dispatch(presence: PresenceDocument, stanza: StanzaElement): boolean {
    const route = classifyPresence(presence)

    switch (route.kind) {
      case 'error':
        this.handlePresenceError(presence, stanza)
        return true
      case 'room':
        this.muc.handleRoomPresence(presence)
        return true
      case 'unavailable':
        this.roster.handleUnavailable(presence)
        return true
      case 'subscribe':
        this.roster.handleSubscribe(presence)
        return true
      case 'subscription-resolved':
        this.roster.handleSubscriptionResolved(presence, route.resolution)
        return true
      case 'available':
        this.roster.handleAvailable(presence)
        return true
      case 'ignored':
        this.emitSDK('console:event', {
          message: `Ignoring presence from ${presence.from}: ${route.reason}`,
          category: 'presence',
        })
        return false
    }
  }

  private handlePresenceError(presence: PresenceDocument, stanza: StanzaElement): void {
    const error = parseXMPPError(stanza.getChild('error'))
    const message = error ? formatXMPPError(error) : 'Unknown presence error'
    // Only log conditions, sender JIDs stay out of info-level output
    logInfo(`Presence error: ${error?.condition ?? 'no error element'}`)
    this.muc.handleRoomError(presence.from)
    this.emitSDK('connection:presence-error', {
      jid: getBareJid(presence.from),
      error,
      message,
    })
  }

  /**
   * Announce our presence: one broadcast, then a directed copy to our
   * occupant in every joined room (rooms do not receive broadcasts).
   *
   * @param show - Presence kind to announce
   * @param status - Optional status text
   * @param idleSeconds - Seconds since last user activity, sent as last activity when positive
   */
  async updatePresence(show: OwnPresence, status?: string, idleSeconds?: number): Promise<void> {
    this.ownPresence = { show, status: status ?? null }

    // Fresh children per stanza: an element has a single parent
    const children = () =>
      ownPresenceChildren(this.ownPresence, {
        priorities: this.options.priorities ?? {},
        capsVer: this.options.capsVer,
        idleSeconds,
      })

    await this.options.sendStanza(xml('presence', {}, ...children()))
    for (const to of this.muc.occupantJids()) {
      await this.options.sendStanza(xml('presence', { to }, ...children()))
    }
  }

  /**
   * What we currently announce.
   */
  getOwnPresence(): OwnPresenceState {
    return this.ownPresence
  }

  /**
   * Drop session state (disconnect): pending subscription requests,
   * in-flight caps queries and room memberships. Event subscriptions stay.
   */
  reset(): void {
    this.roster.reset()
    this.muc.reset()
    this.caps.reset()
    this.ownPresence = { show: 'online', status: null }
  }
}
