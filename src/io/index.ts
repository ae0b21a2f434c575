export * from "./companyInputs";
export * from "./postingsCsv";
