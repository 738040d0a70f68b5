export const PROFILE_FETCHER = 'PROFILE_FETCHER';

export interface ProfileFetchRequest {
  /** Task the call belongs to; connections are scoped to it. */
  taskId: string;
  steamId: string;
  /** Proxy URI to tunnel through, or null for a direct connection. */
  proxyUri: string | null;
  signal?: AbortSignal;
}

export interface ProfileFetchResponse {
  statusCode: number;
  body: string;
}

/**
 * One outbound status call. Resolves with any HTTP response; rejects with
 * TransientExternalError on transport failures, or with the signal's reason
 * when aborted.
 */
export interface IProfileFetcher {
  fetchProfile(request: ProfileFetchRequest): Promise<ProfileFetchResponse>;
  /** Closes the connections no other task is still using. */
  release(taskId: string): Promise<void>;
}
