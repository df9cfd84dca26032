export { roomStore, selectOccupants } from './roomStore'
export type { RoomState } from './roomStore'
export { contactStore, computeAggregatedPresence } from './contactStore'
export type { ContactState } from './contactStore'
