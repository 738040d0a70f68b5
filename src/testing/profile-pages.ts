import type { ProfileFetchResponse } from '@/shared/ban-check/checker/profile-fetcher.interface';

export const profilePages = {
  banned: (text = '1 VAC ban on record') =>
    `<html><body><div class="profile_ban_status"><span class="profile_ban_info">${text}</span></div></body></html>`,
  private: () =>
    '<html><body><div class="profile_private_info">This profile is private.</div></body></html>',
  clean: () =>
    '<html><body><div class="profile_header_centered_persona"><span>player</span></div></body></html>',
  unknown: () => '<html><body><p>Something else entirely</p></body></html>',
};

export function ok(body: string): ProfileFetchResponse {
  return { statusCode: 200, body };
}

export function status(statusCode: number): ProfileFetchResponse {
  return { statusCode, body: '' };
}
