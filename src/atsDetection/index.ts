/**
 * ATS detection module barrel exports
 */

export * from "./detectProvider";
export * from "./resolveSlug";
export * from "./urlUtils";
