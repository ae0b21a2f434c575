/**
 * Ashby non-user GraphQL payload types
 *
 * Raw shapes returned by the JobBoardAllPositions operation.
 * Internal to the Ashby client.
 */

export type AshbyJob = {
  id?: string;
  title?: string;
  locationSlug?: string;
  locationName?: string;
  applyUrl?: string;
  publishedAt?: string;
};

export type AshbyTeam = {
  name?: string;
  jobs?: AshbyJob[] | null;
};

export type AshbyJobBoardResponse = {
  data?: {
    jobBoard?: {
      teams?: AshbyTeam[] | null;
    } | null;
  } | null;
  errors?: Array<{ message?: string }>;
};
