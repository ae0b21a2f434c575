export { GreenhouseAtsClient } from "./greenhouseAtsClient";
export { mapGreenhouseJobToPosting } from "./mappers";
