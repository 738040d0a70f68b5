export type CallerRole = 'admin' | 'user';

/** Identity forwarded by the tenancy gateway in front of the API. */
export interface Caller {
  id: string;
  role: CallerRole;
}

export interface CallerRequest {
  headers: Record<string, string | string[] | undefined>;
  params?: Record<string, string | undefined>;
  caller?: Caller;
}
