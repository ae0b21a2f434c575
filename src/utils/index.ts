/**
 * Utils barrel exports
 */

export * from "./text/markup";
export * from "./payload/payloadFields";
export * from "./csv/csv";
