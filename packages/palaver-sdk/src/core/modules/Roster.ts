import { xml } from '@xmpp/client'
import { BaseModule } from './BaseModule'
import { getBareJid, getResource, isSameBareJid } from '../jid'
import { isAvailableContactPresence } from '../presenceRouting'
import { parsePriority, presenceFromShow } from '../stanza'
import { SubscriptionRequests } from '../subscriptionRequests'
import type { PresenceDocument, Resource, SubscriptionKind } from '../types'

/**
 * Contact presence and subscription module.
 *
 * Handles one-to-one presence:
 * - Available/unavailable presence from contacts → `contact:online` /
 *   `contact:offline`
 * - Inbound subscription requests and their resolution
 * - Outbound subscription answers (approve, deny, request)
 *
 * @remarks
 * Presence from other resources of our own account shares the wire shape
 * of contact presence but is not a contact: it is dropped here.
 *
 * @example
 * ```typescript
 * client.roster.approveSubscription('dave@example.com')
 * for (const jid of client.roster.pendingSubscriptions()) {
 *   console.log('waiting:', jid)
 * }
 * ```
 *
 * @category Modules
 */
export class Roster extends BaseModule {
  private subscriptions = new SubscriptionRequests()

  /**
   * Available presence from a contact resource.
   */
  handleAvailable(presence: PresenceDocument): void {
    if (!isAvailableContactPresence(presence)) return

    const bareJid = getBareJid(presence.from)
    const capsKey = this.deps.resolveCaps(presence)

    if (this.isOwnAccount(bareJid)) {
      this.trace('presence', `Ignoring presence from own resource ${getResource(presence.from) ?? ''}`)
      return
    }

    const resource: Resource = {
      name: getResource(presence.from) ?? '',
      presence: presenceFromShow(presence.show),
      status: presence.status,
      priority: parsePriority(presence.priority),
      capsKey,
    }

    this.deps.emitSDK('contact:online', {
      jid: bareJid,
      resource,
      lastActivity: this.lastActivity(presence),
    })
  }

  /**
   * Unavailable presence from a contact resource.
   */
  handleUnavailable(presence: PresenceDocument): void {
    const bareJid = getBareJid(presence.from)
    if (this.isOwnAccount(bareJid)) return

    this.deps.emitSDK('contact:offline', {
      jid: bareJid,
      resource: getResource(presence.from) ?? null,
      status: presence.status,
    })
  }

  handleSubscribe(presence: PresenceDocument): void {
    const bareJid = getBareJid(presence.from)
    this.subscriptions.recordRequest(bareJid)
    this.trace('subscription', `Subscription request from ${bareJid}`)
    this.deps.emitSDK('subscription:request', { jid: bareJid })
  }

  /**
   * The peer settled a subscription itself (`subscribed` or `unsubscribed`),
   * so any request of theirs we still hold is moot.
   */
  handleSubscriptionResolved(presence: PresenceDocument, kind: Exclude<SubscriptionKind, 'subscribe'>): void {
    const bareJid = getBareJid(presence.from)
    this.subscriptions.resolve(bareJid)
    this.deps.emitSDK('subscription:resolved', { jid: bareJid, kind })
  }

  // --- Outgoing Subscription Methods ---

  /** Ask `jid` to share its presence with us */
  async requestSubscription(jid: string): Promise<void> {
    await this.sendSubscription(jid, 'subscribe')
  }

  /** Accept a pending request: `jid` may see our presence */
  async approveSubscription(jid: string): Promise<void> {
    await this.sendSubscription(jid, 'subscribed')
  }

  /** Refuse a pending request, or revoke an existing subscription */
  async denySubscription(jid: string): Promise<void> {
    await this.sendSubscription(jid, 'unsubscribed')
  }

  /** Bare JIDs with a subscription request awaiting an answer */
  pendingSubscriptions(): Iterable<string> {
    return this.subscriptions.listPending()
  }

  hasPendingSubscription(jid: string): boolean {
    return this.subscriptions.has(getBareJid(jid))
  }

  /** Drop session state */
  reset(): void {
    this.subscriptions.clear()
  }

  private async sendSubscription(jid: string, type: SubscriptionKind): Promise<void> {
    const bareJid = getBareJid(jid)
    if (this.subscriptions.resolve(bareJid)) {
      this.deps.emitSDK('subscription:answered', { jid: bareJid, kind: type })
    }
    this.trace('subscription', `Sending presence ${type} to ${bareJid}`)
    await this.deps.sendStanza(xml('presence', { to: bareJid, type }))
  }

  private isOwnAccount(bareJid: string): boolean {
    const ownJid = this.deps.getCurrentJid()
    return ownJid !== null && isSameBareJid(ownJid, bareJid)
  }

  private lastActivity(presence: PresenceDocument): Date | null {
    if (presence.idleSeconds > 0) {
      return new Date(Date.now() - presence.idleSeconds * 1000)
    }
    return presence.idleSince
  }
}
