import { describe, it, expect, beforeEach } from 'vitest'
import { computeAggregatedPresence, contactStore } from './contactStore'
import type { Resource } from '../core/types'

const resource = (name: string, overrides: Partial<Resource> = {}): Resource => ({
  name,
  presence: 'online',
  status: null,
  priority: 0,
  capsKey: null,
  ...overrides,
})

describe('computeAggregatedPresence', () => {
  it('should be offline without resources', () => {
    expect(computeAggregatedPresence(new Map())).toEqual({ presence: 'offline', status: null })
  })

  it('should pick the highest priority resource', () => {
    const resources = new Map([
      ['phone', resource('phone', { presence: 'chat', priority: 0 })],
      ['laptop', resource('laptop', { presence: 'dnd', status: 'Meeting', priority: 10 })],
    ])
    expect(computeAggregatedPresence(resources)).toEqual({ presence: 'dnd', status: 'Meeting' })
  })

  it('should break priority ties by presence rank', () => {
    const resources = new Map([
      ['a', resource('a', { presence: 'xa', priority: 5 })],
      ['b', resource('b', { presence: 'away', priority: 5 })],
      ['c', resource('c', { presence: 'dnd', priority: 5 })],
    ])
    expect(computeAggregatedPresence(resources).presence).toBe('away')
  })
})

describe('contactStore', () => {
  beforeEach(() => {
    contactStore.getState().reset()
  })

  it('should create a contact on first presence', () => {
    const lastActivity = new Date('2024-03-01T10:00:00Z')
    contactStore.getState().applyOnline('bob@example.com', resource('laptop', { presence: 'away', status: 'Lunch' }), lastActivity)

    const contact = contactStore.getState().getContact('bob@example.com')
    expect(contact).toMatchObject({
      jid: 'bob@example.com',
      presence: 'away',
      status: 'Lunch',
      lastActivity,
      offlineStatus: null,
    })
    expect(contact?.resources.size).toBe(1)
  })

  it('should re-aggregate when a resource goes offline', () => {
    contactStore.getState().applyOnline('bob@example.com', resource('laptop', { presence: 'dnd', priority: 10 }), null)
    contactStore.getState().applyOnline('bob@example.com', resource('phone', { presence: 'away', priority: 1 }), null)

    contactStore.getState().applyOffline('bob@example.com', 'laptop', null)

    expect(contactStore.getState().getContact('bob@example.com')?.presence).toBe('away')
  })

  it('should go offline with the last resource and keep its status', () => {
    contactStore.getState().applyOnline('bob@example.com', resource('laptop'), null)
    contactStore.getState().applyOffline('bob@example.com', 'laptop', 'Gone home')

    expect(contactStore.getState().getContact('bob@example.com')).toMatchObject({
      presence: 'offline',
      status: null,
      offlineStatus: 'Gone home',
    })
    expect(contactStore.getState().onlineContacts()).toEqual([])
  })

  it('should take every resource down on bare unavailable', () => {
    contactStore.getState().applyOnline('bob@example.com', resource('laptop'), null)
    contactStore.getState().applyOnline('bob@example.com', resource('phone'), null)

    contactStore.getState().applyOffline('bob@example.com', null, null)

    expect(contactStore.getState().getContact('bob@example.com')?.resources.size).toBe(0)
  })

  it('should ignore unavailable from unknown contacts', () => {
    contactStore.getState().applyOffline('nobody@example.com', 'x', null)
    expect(contactStore.getState().getContact('nobody@example.com')).toBeUndefined()
  })

  it('should list online contacts', () => {
    contactStore.getState().applyOnline('bob@example.com', resource('laptop'), null)
    contactStore.getState().applyOnline('carol@example.com', resource('phone'), null)
    contactStore.getState().applyOffline('carol@example.com', 'phone', null)

    expect(contactStore.getState().onlineContacts().map((c) => c.jid)).toEqual(['bob@example.com'])
  })

  it('should keep subscription requests unique and in order', () => {
    contactStore.getState().addSubscriptionRequest('dave@example.com')
    contactStore.getState().addSubscriptionRequest('erin@example.com')
    contactStore.getState().addSubscriptionRequest('dave@example.com')
    contactStore.getState().removeSubscriptionRequest('erin@example.com')

    expect(contactStore.getState().subscriptionRequests).toEqual(['dave@example.com'])
  })
})
