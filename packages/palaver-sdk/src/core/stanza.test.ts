import { describe, it, expect } from 'vitest'
import { parsePresence, parsePresenceType, parsePriority, presenceFromShow } from './stanza'
import { capsChild, createMockElement, createPresence, mucUser } from './test-utils'

describe('presence parsing', () => {
  describe('parsePresenceType', () => {
    it('should treat a missing type as available', () => {
      expect(parsePresenceType(undefined)).toBe('available')
      expect(parsePresenceType('')).toBe('available')
    })

    it('should keep RFC types', () => {
      expect(parsePresenceType('unsubscribed')).toBe('unsubscribed')
      expect(parsePresenceType('probe')).toBe('probe')
    })

    it('should map anything else to unknown', () => {
      expect(parsePresenceType('available')).toBe('unknown')
      expect(parsePresenceType('bogus')).toBe('unknown')
    })
  })

  describe('presenceFromShow', () => {
    it('should pass through known show values', () => {
      expect(presenceFromShow('dnd')).toBe('dnd')
      expect(presenceFromShow('chat')).toBe('chat')
    })

    it('should default to online', () => {
      expect(presenceFromShow(null)).toBe('online')
      expect(presenceFromShow('sleeping')).toBe('online')
    })
  })

  describe('parsePriority', () => {
    it('should parse integers, including negative ones', () => {
      expect(parsePriority('10')).toBe(10)
      expect(parsePriority('-5')).toBe(-5)
    })

    it('should tolerate surrounding noise', () => {
      expect(parsePriority(' 7abc')).toBe(7)
    })

    it('should return 0 for absent or non-numeric values', () => {
      expect(parsePriority(null)).toBe(0)
      expect(parsePriority('high')).toBe(0)
    })
  })

  describe('parsePresence', () => {
    it('should return null for non-presence stanzas', () => {
      expect(parsePresence(createMockElement('message', { from: 'a@example.com' }))).toBeNull()
    })

    it('should return null without a from attribute', () => {
      expect(parsePresence(createPresence({}))).toBeNull()
    })

    it('should read show, status, priority and idle time', () => {
      const doc = parsePresence(
        createPresence({ from: 'bob@example.com/laptop' }, [
          { name: 'show', text: 'away' },
          { name: 'status', text: 'Lunch' },
          { name: 'priority', text: '5' },
          { name: 'query', attrs: { xmlns: 'jabber:iq:last', seconds: '120' } },
        ])
      )

      expect(doc).toEqual({
        from: 'bob@example.com/laptop',
        type: 'available',
        show: 'away',
        status: 'Lunch',
        priority: '5',
        idleSeconds: 120,
        idleSince: null,
        caps: null,
        muc: null,
      })
    })

    it('should treat empty status as absent', () => {
      const doc = parsePresence(createPresence({ from: 'bob@example.com/laptop' }, [{ name: 'status', text: '' }]))
      expect(doc?.status).toBeNull()
    })

    it('should ignore invalid or zero idle seconds', () => {
      const zero = parsePresence(
        createPresence({ from: 'bob@example.com/a' }, [
          { name: 'query', attrs: { xmlns: 'jabber:iq:last', seconds: '0' } },
        ])
      )
      const junk = parsePresence(
        createPresence({ from: 'bob@example.com/a' }, [
          { name: 'query', attrs: { xmlns: 'jabber:iq:last', seconds: 'soon' } },
        ])
      )
      expect(zero?.idleSeconds).toBe(0)
      expect(junk?.idleSeconds).toBe(0)
    })

    it('should ignore last-activity queries in another namespace', () => {
      const doc = parsePresence(
        createPresence({ from: 'bob@example.com/a' }, [{ name: 'query', attrs: { xmlns: 'urn:example:other', seconds: '30' } }])
      )
      expect(doc?.idleSeconds).toBe(0)
    })

    it('should read a valid idle since date', () => {
      const doc = parsePresence(
        createPresence({ from: 'bob@example.com/a' }, [
          { name: 'idle', attrs: { xmlns: 'urn:xmpp:idle:1', since: '2024-03-01T10:00:00Z' } },
        ])
      )
      expect(doc?.idleSince?.toISOString()).toBe('2024-03-01T10:00:00.000Z')
    })

    it('should drop an unparseable idle since date', () => {
      const doc = parsePresence(
        createPresence({ from: 'bob@example.com/a' }, [{ name: 'idle', attrs: { xmlns: 'urn:xmpp:idle:1', since: 'yesterday' } }])
      )
      expect(doc?.idleSince).toBeNull()
    })

    it('should read caps attributes, with missing ones as null', () => {
      const doc = parsePresence(
        createPresence({ from: 'bob@example.com/a' }, [capsChild({ node: 'urn:example:client', ver: 'abc=' })])
      )
      expect(doc?.caps).toEqual({ hash: null, node: 'urn:example:client', ver: 'abc=' })
    })

    it('should read muc#user status codes and the 303 nick', () => {
      const doc = parsePresence(
        createPresence({ from: 'room@conference.example.com/alice', type: 'unavailable' }, [mucUser(['303', '110'], 'alice2')])
      )
      expect(doc?.muc).toEqual({
        statusCodes: ['303', '110'],
        isSelf: true,
        isNickChange: true,
        newNick: 'alice2',
      })
    })

    it('should not report an item nick without status 303', () => {
      const doc = parsePresence(createPresence({ from: 'room@conference.example.com/alice' }, [mucUser([], 'alice')]))
      expect(doc?.muc).toEqual({ statusCodes: [], isSelf: false, isNickChange: false, newNick: null })
    })
  })
})
