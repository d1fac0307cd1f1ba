export const STATUS_TYPES = ["Daily", "Weekly"] as const;

export type StatusType = (typeof STATUS_TYPES)[number];

export type StatusPeriod =
  | { type: "Daily"; date: string }
  | { type: "Weekly"; startDate: string; endDate: string };

/** Body of `POST /api/status`. Dates are ISO `YYYY-MM-DD` strings. */
export interface StatusRequest {
  type: StatusType;
  profile: string;
  date?: string;
  startDate?: string;
  endDate?: string;
  content: string;
}

export interface StatusEntry {
  profile: string;
  period: StatusPeriod;
  content: string;
  fileName: string;
}

export interface WriteResult {
  documentId: string;
  created: boolean;
}

export interface SubmissionResult extends WriteResult {
  fileName: string;
  profileFolderId: string;
}

export interface StatusConfigResponse {
  profiles: string[];
  statusTypes: StatusType[];
  today: string;
}

export interface ApiErrorBody {
  error: { code: string; message: string };
}

/** One positional insert in a Docs batch update. Offsets are 1-based. */
export interface TextInsert {
  index: number;
  text: string;
}

export interface ServiceAccountCredential {
  type: string;
  project_id: string;
  private_key_id: string;
  private_key: string;
  client_email: string;
  client_id: string;
  auth_uri: string;
  token_uri: string;
  auth_provider_x509_cert_url: string;
  client_x509_cert_url: string;
  universe_domain: string;
}
