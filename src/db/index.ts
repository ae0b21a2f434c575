/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/seenKeysRepo";
