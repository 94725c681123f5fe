export * from "./ConnectionController.js";
export { AddressSpaceWalker, type BrowseNodeOptions } from "./AddressSpaceWalker.js";
export { ReferenceStore, type ReferenceEntry } from "./ReferenceStore.js";
export { SubscriptionManager } from "./SubscriptionManager.js";
export { ValueIO, type WriteOptions } from "./ValueIO.js";
export type { SessionContext } from "./SessionContext.js";
