import { createStore } from 'zustand/vanilla'
import type { ContactPresence, Resource, ResourcePresence } from '../core/types'

/**
 * Contact presence state.
 *
 * One entry per bare JID we have seen presence from, with the presence of
 * each of its resources and the aggregated presence shown for the
 * contact. Also holds the inbound subscription requests awaiting an answer.
 *
 * @category Stores
 */
interface ContactState {
  contacts: Map<string, ContactPresence>
  /** Bare JIDs with a pending subscription request, in arrival order */
  subscriptionRequests: string[]

  // Actions
  applyOnline: (jid: string, resource: Resource, lastActivity: Date | null) => void
  applyOffline: (jid: string, resource: string | null, status: string | null) => void
  addSubscriptionRequest: (jid: string) => void
  removeSubscriptionRequest: (jid: string) => void
  getContact: (jid: string) => ContactPresence | undefined
  reset: () => void

  // Computed
  onlineContacts: () => ContactPresence[]
}

const PRESENCE_RANK: Record<ResourcePresence, number> = {
  chat: 0,
  online: 1,
  away: 2,
  xa: 3,
  dnd: 4,
  offline: 5,
}

/**
 * Compute aggregated presence from all resources
 * Rules:
 * 1. Highest priority resource wins
 * 2. On priority tie, "best" presence wins (chat > online > away > xa > dnd)
 * 3. Returns offline only when no resources
 */
export function computeAggregatedPresence(resources: Map<string, Resource>): {
  presence: ResourcePresence
  status: string | null
} {
  let best: Resource | null = null

  for (const resource of resources.values()) {
    if (
      !best ||
      resource.priority > best.priority ||
      (resource.priority === best.priority && PRESENCE_RANK[resource.presence] < PRESENCE_RANK[best.presence])
    ) {
      best = resource
    }
  }

  if (!best) return { presence: 'offline', status: null }
  return { presence: best.presence, status: best.status }
}

function emptyContact(jid: string): ContactPresence {
  return {
    jid,
    resources: new Map(),
    presence: 'offline',
    status: null,
    lastActivity: null,
    offlineStatus: null,
  }
}

export const contactStore = createStore<ContactState>((set, get) => ({
  contacts: new Map(),
  subscriptionRequests: [],

  applyOnline: (jid, resource, lastActivity) => {
    set((state) => {
      const newContacts = new Map(state.contacts)
      const existing = newContacts.get(jid) ?? emptyContact(jid)

      const resources = new Map(existing.resources)
      resources.set(resource.name, resource)
      const aggregated = computeAggregatedPresence(resources)

      newContacts.set(jid, {
        ...existing,
        resources,
        presence: aggregated.presence,
        status: aggregated.status,
        lastActivity,
        offlineStatus: null,
      })
      return { contacts: newContacts }
    })
  },

  applyOffline: (jid, resource, status) => {
    set((state) => {
      const existing = state.contacts.get(jid)
      if (!existing) return state

      // Unavailable from the bare JID takes every resource down
      const resources = new Map(existing.resources)
      if (resource === null) {
        resources.clear()
      } else {
        resources.delete(resource)
      }
      const aggregated = computeAggregatedPresence(resources)

      const newContacts = new Map(state.contacts)
      newContacts.set(jid, {
        ...existing,
        resources,
        presence: aggregated.presence,
        status: aggregated.status,
        offlineStatus: resources.size === 0 ? status : existing.offlineStatus,
      })
      return { contacts: newContacts }
    })
  },

  addSubscriptionRequest: (jid) => {
    set((state) => {
      if (state.subscriptionRequests.includes(jid)) return state
      return { subscriptionRequests: [...state.subscriptionRequests, jid] }
    })
  },

  removeSubscriptionRequest: (jid) => {
    set((state) => {
      if (!state.subscriptionRequests.includes(jid)) return state
      return { subscriptionRequests: state.subscriptionRequests.filter((pending) => pending !== jid) }
    })
  },

  getContact: (jid) => get().contacts.get(jid),

  reset: () => set({ contacts: new Map(), subscriptionRequests: [] }),

  onlineContacts: () => Array.from(get().contacts.values()).filter((contact) => contact.presence !== 'offline'),
}))

export type { ContactState }
