export { WorkdayAtsClient, WORKDAY_JOBS_REQUEST_BODY } from "./workdayAtsClient";
export { parseWorkdayBoard, workdayJobsUrl } from "./workdayBoard";
export { mapWorkdayPostingToPosting } from "./mappers";
