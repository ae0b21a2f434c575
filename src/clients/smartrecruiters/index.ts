export { SmartRecruitersAtsClient } from "./smartRecruitersAtsClient";
export {
  mapSmartRecruitersPostingToPosting,
  resolveSmartRecruitersUrl,
  sectionText,
} from "./mappers";
