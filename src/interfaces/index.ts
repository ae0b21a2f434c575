export type { AtsPostingsClient } from "./clients/atsPostingsClient";
export type { SeenStore } from "./dedup/seenStore";
