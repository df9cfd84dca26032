/**
 * XMPP Namespace Constants
 *
 * Namespaces of the XEPs the presence engine reads from inbound stanzas
 * or writes into outbound ones.
 */

// RFC 6120: XMPP Stanza Error Conditions
export const NS_XMPP_STANZAS = 'urn:ietf:params:xml:ns:xmpp-stanzas'

// XEP-0030: Service Discovery
export const NS_DISCO_INFO = 'http://jabber.org/protocol/disco#info'

// XEP-0115: Entity Capabilities
export const NS_CAPS = 'http://jabber.org/protocol/caps'

// XEP-0045: Multi-User Chat (MUC)
export const NS_MUC = 'http://jabber.org/protocol/muc'
export const NS_MUC_USER = 'http://jabber.org/protocol/muc#user'

// XEP-0012 / XEP-0256: Last Activity (idle seconds in presence)
export const NS_LAST_ACTIVITY = 'jabber:iq:last'

// XEP-0319: Last User Interaction in Presence
export const NS_IDLE = 'urn:xmpp:idle:1'

/**
 * XEP-0045 status codes carried in `<x xmlns='…muc#user'><status code=…/></x>`.
 */
export const MUC_STATUS_SELF_PRESENCE = '110'
export const MUC_STATUS_NICK_CHANGE = '303'
