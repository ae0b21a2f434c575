/**
 * Dedup module barrel exports
 */

export * from "./postingFingerprint";
export * from "./partitionFreshPostings";
export * from "./fileSeenStore";
export * from "./sqliteSeenStore";
