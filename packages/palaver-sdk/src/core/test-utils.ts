/**
 * Shared test utilities for presence tests
 */
import { vi, type Mock } from 'vitest'
import type { ModuleDependencies } from './modules/BaseModule'
import type { OutboundStanza, PresenceDocument, SDKEvents, StanzaElement } from './types'
import { parsePresence } from './stanza'
import { roomStore } from '../stores/roomStore'

export interface MockChildInput {
  name: string
  attrs?: Record<string, string>
  text?: string
  children?: MockChildInput[]
}

/**
 * Build an inbound element with the lookup methods the parser uses.
 * `getChild`/`getChildren`/`getChildText` honour the optional xmlns filter.
 */
export const createMockElement = (
  name: string,
  attrs: Record<string, string> = {},
  children: MockChildInput[] = [],
  text?: string
): StanzaElement => {
  const childElements = children.map((child) =>
    createMockElement(child.name, child.attrs ?? {}, child.children ?? [], child.text)
  )

  const matches = (child: StanzaElement, childName: string, xmlns?: string) =>
    child.name === childName && (xmlns === undefined || child.attrs.xmlns === xmlns)

  return {
    name,
    attrs: { ...attrs },
    children: text === undefined ? childElements : [...childElements, text],
    getChild: (childName, xmlns) => childElements.find((c) => matches(c, childName, xmlns)),
    getChildren: (childName, xmlns) => childElements.filter((c) => matches(c, childName, xmlns)),
    getChildText: (childName, xmlns) =>
      childElements.find((c) => matches(c, childName, xmlns))?.getText() ?? null,
    getText: () => text ?? null,
  }
}

/**
 * Presence stanza shorthand.
 */
export const createPresence = (attrs: Record<string, string>, children: MockChildInput[] = []): StanzaElement =>
  createMockElement('presence', attrs, children)

/**
 * Parsed presence shorthand for module tests.
 */
export const createPresenceDoc = (attrs: Record<string, string>, children: MockChildInput[] = []): PresenceDocument => {
  const doc = parsePresence(createPresence(attrs, children))
  if (!doc) throw new Error(`Not a presence with a sender: ${JSON.stringify(attrs)}`)
  return doc
}

/**
 * `<x xmlns='…muc#user'/>` child with status codes and an optional item nick.
 */
export const mucUser = (codes: string[] = [], itemNick?: string): MockChildInput => ({
  name: 'x',
  attrs: { xmlns: 'http://jabber.org/protocol/muc#user' },
  children: [
    ...(itemNick === undefined
      ? [{ name: 'item', attrs: { affiliation: 'member', role: 'participant' } }]
      : [{ name: 'item', attrs: { affiliation: 'member', role: 'participant', nick: itemNick } }]),
    ...codes.map((code) => ({ name: 'status', attrs: { code } })),
  ],
})

/**
 * `<c xmlns='…caps'/>` child.
 */
export const capsChild = (attrs: Record<string, string>): MockChildInput => ({
  name: 'c',
  attrs: { xmlns: 'http://jabber.org/protocol/caps', ...attrs },
})

export interface EmittedEvent {
  event: keyof SDKEvents
  payload: unknown
}

export interface MockModuleDeps {
  deps: ModuleDependencies
  sendStanza: Mock<(stanza: OutboundStanza) => Promise<void>>
  /** Every emitted event in order, console traces excluded */
  events: EmittedEvent[]
}

/**
 * Module dependencies backed by the real room store and recording emitters.
 * Reset the room store in `beforeEach` when using this.
 */
export const createMockDeps = (
  overrides: Partial<ModuleDependencies> = {},
  currentJid: string | null = 'me@example.com/desktop'
): MockModuleDeps => {
  const events: EmittedEvent[] = []
  const sendStanza = vi.fn<(stanza: OutboundStanza) => Promise<void>>().mockResolvedValue(undefined)

  const emitSDK = <K extends keyof SDKEvents>(event: K, payload: SDKEvents[K]) => {
    if (event === 'console:event') return
    events.push({ event, payload })
  }

  const deps: ModuleDependencies = {
    sendStanza,
    getCurrentJid: () => currentJid,
    emitSDK,
    rooms: roomStore.getState(),
    resolveCaps: () => null,
    getOwnPresence: () => ({ show: 'online', status: null }),
    priorities: {},
    ...overrides,
  }

  return { deps, sendStanza, events }
}
