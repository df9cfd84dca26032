import { describe, it, expect } from 'vitest'
import { parseJid, getBareJid, getResource, createFullJid, isSameBareJid } from './jid'

describe('JID utilities', () => {
  describe('parseJid', () => {
    it('should parse a full JID', () => {
      expect(parseJid('user@example.com/mobile')).toEqual({
        bare: 'user@example.com',
        resource: 'mobile',
        full: 'user@example.com/mobile',
      })
    })

    it('should parse a bare JID without resource', () => {
      expect(parseJid('user@example.com')).toEqual({
        bare: 'user@example.com',
        full: 'user@example.com',
      })
    })

    it('should keep slashes inside the resource', () => {
      expect(parseJid('room@conference.example.com/a/b').resource).toBe('a/b')
    })
  })

  describe('getBareJid / getResource', () => {
    it('should split an occupant JID', () => {
      expect(getBareJid('room@conference.example.com/alice')).toBe('room@conference.example.com')
      expect(getResource('room@conference.example.com/alice')).toBe('alice')
    })

    it('should return undefined resource for bare JIDs', () => {
      expect(getResource('user@example.com')).toBeUndefined()
    })
  })

  describe('createFullJid', () => {
    it('should join bare JID and resource', () => {
      expect(createFullJid('room@conference.example.com', 'bob')).toBe('room@conference.example.com/bob')
    })

    it('should return the bare JID for an empty resource', () => {
      expect(createFullJid('user@example.com', '')).toBe('user@example.com')
    })
  })

  describe('isSameBareJid', () => {
    it('should ignore resources', () => {
      expect(isSameBareJid('user@example.com/phone', 'user@example.com/laptop')).toBe(true)
    })

    it('should compare case-insensitively', () => {
      expect(isSameBareJid('User@Example.com', 'user@example.com')).toBe(true)
    })

    it('should tell different accounts apart', () => {
      expect(isSameBareJid('user@example.com', 'other@example.com')).toBe(false)
    })
  })
})
