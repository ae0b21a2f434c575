export * from "./runConfig";
export * from "./feedOrchestrator";
