export * from "./logger";
export * from "./postings";
export * from "./atsDetection";
export * from "./dedup";
export * from "./runner";
export * from "./clients/http";
export * from "./clients/atsClient";
// Raw provider payload types are NOT exported from the global barrel.
// Import them from "@/types/clients/<provider>" within src/clients/<provider>/ only.
