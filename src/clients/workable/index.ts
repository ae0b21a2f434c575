export { WorkableAtsClient } from "./workableAtsClient";
export { mapWorkableJobToPosting } from "./mappers";
