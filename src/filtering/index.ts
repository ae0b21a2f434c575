export * from "./keywordFilter";
