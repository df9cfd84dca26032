/**
 * XEP-0115 Entity Capabilities: cache keys and discovery triggering.
 *
 * A presence may carry `<c xmlns='http://jabber.org/protocol/caps'
 * hash=… node=… ver=…/>`. With the supported hash, `ver` identifies a
 * feature set shared by every entity announcing it, so one disco#info
 * answer serves all of them. Without it (legacy caps, or a hash we do not
 * verify) the announcement is only trusted for the sender that made it.
 *
 * @module Core/Caps
 */

import { xml } from '@xmpp/client'
import { DISCO_QUERY_ID, LEGACY_DISCO_ID_PREFIX, SUPPORTED_CAPS_HASH } from './config'
import { NS_DISCO_INFO } from './namespaces'
import { logWarn } from './logger'
import type {
  CapsAdvertisement,
  CapsCache,
  CapsKey,
  DiscoQuery,
  OutboundStanza,
  PresenceDocument,
  SDKEvents,
} from './types'

export interface CapsResolution {
  key: CapsKey | null
  /** Disco#info request to send, or null when nothing needs discovering */
  query: DiscoQuery | null
}

/**
 * Stable string form of a caps key, namespaced by kind.
 */
export function capsKeyId(key: CapsKey): string {
  return key.kind === 'hashed' ? `hashed:${key.ver}` : `legacy:${key.jid}`
}

function discoNode(caps: CapsAdvertisement): string | null {
  if (caps.node && caps.ver) return `${caps.node}#${caps.ver}`
  return caps.node ?? caps.ver
}

/**
 * Compute the caps key of an advertisement and decide whether a
 * disco#info query is needed. Pure: reads the cache, never writes it.
 *
 * @param caps - The `<c/>` element of the presence, if any
 * @param from - Full JID of the presence sender
 */
export function resolveCapsKey(
  caps: CapsAdvertisement | null,
  from: string,
  cache: CapsCache
): CapsResolution {
  if (!caps) return { key: null, query: null }

  if (caps.hash === SUPPORTED_CAPS_HASH) {
    if (!caps.ver) return { key: null, query: null }
    const key: CapsKey = { kind: 'hashed', ver: caps.ver }
    const node = discoNode(caps)
    const query = node && !cache.contains(key) ? { id: DISCO_QUERY_ID, to: from, node } : null
    return { key, query }
  }

  const key: CapsKey = { kind: 'legacy', jid: from }
  const query =
    caps.node && !cache.contains(key)
      ? { id: `${LEGACY_DISCO_ID_PREFIX}${from}`, to: from, node: discoNode(caps) ?? caps.node }
      : null
  return { key, query }
}

/**
 * Build the disco#info IQ for a query.
 */
export function buildDiscoInfoQuery(query: DiscoQuery): OutboundStanza {
  return xml(
    'iq',
    { type: 'get', id: query.id, to: query.to },
    xml('query', { xmlns: NS_DISCO_INFO, node: query.node })
  )
}

export interface CapsResolverDeps {
  cache: CapsCache
  sendStanza: (stanza: OutboundStanza) => Promise<void>
  emitSDK: <K extends keyof SDKEvents>(event: K, payload: SDKEvents[K]) => void
}

/**
 * Session-level wrapper around {@link resolveCapsKey}.
 *
 * Sends the disco#info query for uncached keys and remembers keys whose
 * query is in flight, so a burst of presences announcing the same `ver`
 * produces a single query. The in-flight entry stays until `reset()`:
 * once the response handler has filled the cache, `contains()` answers
 * for it anyway.
 */
export class CapsResolver {
  private inFlight = new Set<string>()

  constructor(private deps: CapsResolverDeps) {}

  resolve(presence: PresenceDocument): CapsKey | null {
    const { key, query } = resolveCapsKey(presence.caps, presence.from, this.deps.cache)
    if (!key || !query) return key

    const id = capsKeyId(key)
    if (this.inFlight.has(id)) {
      this.deps.emitSDK('console:event', {
        message: `Caps query for ${query.node} already pending`,
        category: 'caps',
      })
      return key
    }
    this.inFlight.add(id)

    this.deps.emitSDK('console:event', {
      message: `Caps not cached for ${query.node}, sending disco#info to ${query.to}`,
      category: 'caps',
    })
    this.deps.sendStanza(buildDiscoInfoQuery(query)).catch((err: unknown) => {
      this.inFlight.delete(id)
      logWarn(`Caps disco#info send failed: ${err instanceof Error ? err.message : String(err)}`)
    })
    this.deps.emitSDK('caps:query-sent', { key, ...query })

    return key
  }

  /** Forget in-flight queries (new session) */
  reset(): void {
    this.inFlight.clear()
  }
}

/**
 * In-memory {@link CapsCache}. Applications with persistent caps storage
 * implement the interface themselves.
 */
export class MemoryCapsCache implements CapsCache {
  private entries = new Set<string>()

  contains(key: CapsKey): boolean {
    return this.entries.has(capsKeyId(key))
  }

  add(key: CapsKey): void {
    this.entries.add(capsKeyId(key))
  }

  clear(): void {
    this.entries.clear()
  }
}
