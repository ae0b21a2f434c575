export { LeverAtsClient } from "./leverAtsClient";
export {
  mapLeverPostingToPosting,
  isLeverPostingPublished,
  leverCreatedAtToIso,
} from "./mappers";
