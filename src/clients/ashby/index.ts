export { AshbyAtsClient, buildAshbyJobBoardRequest } from "./ashbyAtsClient";
export { mapAshbyJobToPosting, mapAshbyJobBoardToPostings } from "./mappers";
