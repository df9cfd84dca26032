/**
 * JID (Jabber ID) helpers.
 *
 * Presence routing only needs the `local@domain/resource` split, so these
 * are plain string operations. Resources may themselves contain `/`
 * (everything after the first slash belongs to the resource), which matters
 * for MUC nicknames.
 */

export interface ParsedJid {
  /** `local@domain` */
  bare: string
  /** Resource part, or undefined for a bare JID */
  resource?: string
  /** The input JID as given */
  full: string
}

/**
 * Split a JID into its bare part and resource.
 *
 * @example
 * ```typescript
 * parseJid('room@conference.example.com/alice')
 * // { bare: 'room@conference.example.com', resource: 'alice', full: '…/alice' }
 * ```
 */
export function parseJid(jid: string): ParsedJid {
  const slashIndex = jid.indexOf('/')
  if (slashIndex < 0) {
    return { bare: jid, full: jid }
  }
  return {
    bare: jid.substring(0, slashIndex),
    resource: jid.substring(slashIndex + 1),
    full: jid,
  }
}

export function getBareJid(jid: string): string {
  return parseJid(jid).bare
}

export function getResource(jid: string): string | undefined {
  return parseJid(jid).resource
}

/**
 * Build `bare/resource`. An empty resource yields the bare JID.
 */
export function createFullJid(bareJid: string, resource: string): string {
  if (!bareJid) return ''
  return resource ? `${bareJid}/${resource}` : bareJid
}

/**
 * Compare the bare parts of two JIDs. Domain and local part are compared
 * case-insensitively, as servers normalise them.
 */
export function isSameBareJid(a: string, b: string): boolean {
  return getBareJid(a).toLowerCase() === getBareJid(b).toLowerCase()
}
