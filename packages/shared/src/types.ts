export interface ActivityDetails {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

/** Activities keyed by name, in ascending name order. */
export type ActivityListing = Record<string, ActivityDetails>;

export interface MessageResponse {
  message: string;
}

export interface ErrorResponse {
  detail: string | string[];
}
