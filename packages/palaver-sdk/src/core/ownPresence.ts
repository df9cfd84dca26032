/**
 * Building blocks of the presence we send for ourselves.
 *
 * @module Core/OwnPresence
 */

import { xml } from '@xmpp/client'
import { CAPS_NODE, SUPPORTED_CAPS_HASH, priorityFor, type OwnPresence, type PriorityConfig } from './config'
import { NS_CAPS, NS_LAST_ACTIVITY } from './namespaces'
import type { OutboundStanza } from './types'

export interface OwnPresenceState {
  show: OwnPresence
  status: string | null
}

export interface OwnPresenceOptions {
  priorities: PriorityConfig
  capsVer?: string
  /** Seconds since last user activity, sent as XEP-0256 last activity when positive */
  idleSeconds?: number
}

/**
 * Children of an outbound presence: `<show/>` (omitted for online),
 * `<status/>`, `<priority/>`, last activity and our `<c/>`.
 */
export function ownPresenceChildren(state: OwnPresenceState, options: OwnPresenceOptions): OutboundStanza[] {
  const children: OutboundStanza[] = []

  if (state.show !== 'online') {
    children.push(xml('show', {}, state.show))
  }
  if (state.status) {
    children.push(xml('status', {}, state.status))
  }
  children.push(xml('priority', {}, String(priorityFor(state.show, options.priorities))))

  if (options.idleSeconds !== undefined && options.idleSeconds > 0) {
    children.push(xml('query', { xmlns: NS_LAST_ACTIVITY, seconds: String(options.idleSeconds) }))
  }
  if (options.capsVer) {
    children.push(xml('c', { xmlns: NS_CAPS, hash: SUPPORTED_CAPS_HASH, node: CAPS_NODE, ver: options.capsVer }))
  }

  return children
}
