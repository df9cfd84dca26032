import type { StanzaElement } from '../core/types/stanza'
import { NS_XMPP_STANZAS } from '../core/namespaces'

/**
 * RFC 6120 §8.3 error type categories.
 *
 * - cancel:   Do not retry (the error condition is not expected to change)
 * - continue: Proceed (the condition was only a warning)
 * - modify:   Retry after changing the data sent
 * - auth:     Provide credentials and retry
 * - wait:     Retry after waiting (the error is temporary)
 */
export type XMPPErrorType = 'cancel' | 'continue' | 'modify' | 'auth' | 'wait'

/**
 * Structured form of a presence `<error/>` child.
 *
 * ```xml
 * <presence type="error" from="room@conference.example.com/alice">
 *   <error type="cancel">
 *     <conflict xmlns="urn:ietf:params:xml:ns:xmpp-stanzas"/>
 *   </error>
 * </presence>
 * ```
 */
export interface XMPPStanzaError {
  type: XMPPErrorType
  /** Defined condition element name, e.g. 'conflict' or 'remote-server-not-found' */
  condition: string
  /** Server-provided `<text/>`, if any */
  text?: string
}

function isErrorType(value: string | undefined): value is XMPPErrorType {
  return value === 'cancel' || value === 'continue' || value === 'modify' || value === 'auth' || value === 'wait'
}

/**
 * Parse the `<error/>` of a stanza (or an `<error/>` element itself).
 *
 * @returns null when there is no error element
 */
export function parseXMPPError(element: StanzaElement | undefined | null): XMPPStanzaError | null {
  if (!element) return null

  const errorEl = element.name === 'error' ? element : element.getChild('error')
  if (!errorEl) return null

  // Malformed type attributes fall back to 'cancel'
  const rawType = errorEl.attrs.type
  const type: XMPPErrorType = isErrorType(rawType) ? rawType : 'cancel'

  let condition = 'undefined-condition'
  for (const child of errorEl.children) {
    if (typeof child === 'string') continue
    if (child.attrs.xmlns === NS_XMPP_STANZAS && child.name !== 'text') {
      condition = child.name
      break
    }
  }

  const text = errorEl.getChild('text', NS_XMPP_STANZAS)?.getText() || undefined

  return text === undefined ? { type, condition } : { type, condition, text }
}

/**
 * Human-readable form: the server text when present, otherwise the
 * condition in sentence case ('item-not-found' → 'Item not found').
 */
export function formatXMPPError(error: XMPPStanzaError): string {
  if (error.text) return error.text

  const sentence = error.condition.replace(/-/g, ' ')
  return sentence.charAt(0).toUpperCase() + sentence.slice(1)
}
