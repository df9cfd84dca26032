import { describe, it, expect } from 'vitest'
import { formatXMPPError, parseXMPPError } from './xmppError'
import { createMockElement } from '../core/test-utils'

const NS = 'urn:ietf:params:xml:ns:xmpp-stanzas'

describe('parseXMPPError', () => {
  it('should return null without an error element', () => {
    expect(parseXMPPError(null)).toBeNull()
    expect(parseXMPPError(createMockElement('presence', { type: 'error' }))).toBeNull()
  })

  it('should read type, condition and text from a stanza', () => {
    const stanza = createMockElement('presence', { type: 'error' }, [
      {
        name: 'error',
        attrs: { type: 'cancel' },
        children: [
          { name: 'conflict', attrs: { xmlns: NS } },
          { name: 'text', attrs: { xmlns: NS }, text: 'Nickname in use' },
        ],
      },
    ])
    expect(parseXMPPError(stanza)).toEqual({ type: 'cancel', condition: 'conflict', text: 'Nickname in use' })
  })

  it('should skip a leading text element when finding the condition', () => {
    const error = createMockElement('error', { type: 'auth' }, [
      { name: 'text', attrs: { xmlns: NS }, text: 'Members only' },
      { name: 'registration-required', attrs: { xmlns: NS } },
    ])
    expect(parseXMPPError(error)?.condition).toBe('registration-required')
  })

  it('should fall back for missing or malformed parts', () => {
    const error = createMockElement('error', { type: 'sometimes' })
    expect(parseXMPPError(error)).toEqual({ type: 'cancel', condition: 'undefined-condition' })
  })
})

describe('formatXMPPError', () => {
  it('should prefer the server text', () => {
    expect(formatXMPPError({ type: 'cancel', condition: 'conflict', text: 'Nickname in use' })).toBe('Nickname in use')
  })

  it('should turn the condition into a sentence', () => {
    expect(formatXMPPError({ type: 'cancel', condition: 'item-not-found' })).toBe('Item not found')
  })
})
