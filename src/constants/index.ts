export * from "./logger";
export * from "./atsDetection";
export * from "./normalization";
export * from "./runner";
export * from "./io";
export * from "./clients/http";
export * from "./clients/greenhouse";
export * from "./clients/lever";
export * from "./clients/workable";
export * from "./clients/smartrecruiters";
export * from "./clients/ashby";
export * from "./clients/workday";
