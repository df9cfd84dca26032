import type { CapsKey, OutboundStanza, PresenceDocument, RoomRegistry, SDKEvents } from '../types'
import type { PriorityConfig } from '../config'
import type { OwnPresenceState } from '../ownPresence'

/**
 * Dependencies injected into each module by PresenceClient.
 *
 * Everything a handler needs (our identity, the room registry, the way
 * out to the transport) arrives here instead of being looked up from
 * process-wide state, so modules run in tests without a connection.
 *
 * @internal
 */
export interface ModuleDependencies {
  sendStanza: (stanza: OutboundStanza) => Promise<void>
  /** Our full JID, or null before the session is bound */
  getCurrentJid: () => string | null
  emitSDK: <K extends keyof SDKEvents>(event: K, payload: SDKEvents[K]) => void
  rooms: RoomRegistry
  /**
   * Resolve the caps key of a presence and trigger discovery when the key
   * is not cached yet.
   */
  resolveCaps: (presence: PresenceDocument) => CapsKey | null
  /** What we currently announce (show and status), used for room joins */
  getOwnPresence: () => OwnPresenceState
  priorities: PriorityConfig
  /** Our own XEP-0115 verification string, attached to outbound presence when set */
  capsVer?: string
}

/**
 * Base class for the presence modules of PresenceClient.
 *
 * Each module owns one slice of the presence protocol. PresenceClient
 * classifies inbound stanzas and calls the matching module handler; the
 * modules also expose outbound operations (subscription answers, room
 * joins) that callers reach through the client.
 *
 * @example Creating a custom module
 * ```typescript
 * class Probe extends BaseModule {
 *   async probe(jid: string): Promise<void> {
 *     await this.deps.sendStanza(xml('presence', { to: jid, type: 'probe' }))
 *   }
 * }
 * ```
 *
 * @category Modules
 * @internal
 */
export abstract class BaseModule {
  protected deps: ModuleDependencies

  constructor(deps: ModuleDependencies) {
    this.deps = deps
  }

  /**
   * Emit a protocol trace for debug consoles.
   */
  protected trace(category: SDKEvents['console:event']['category'], message: string): void {
    this.deps.emitSDK('console:event', { message, category })
  }
}
