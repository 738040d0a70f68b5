import * as cheerio from 'cheerio';
import { StatusSummary } from '../interfaces/task.interface';

export interface ProfileClassification {
  statusSummary: Exclude<StatusSummary, StatusSummary.ERROR>;
  details: string;
}

/**
 * Maps a profile page to BANNED / PRIVATE / CLEAN. Returns null when none of
 * the known profile markers is present.
 */
export function classifyProfilePage(html: string): ProfileClassification | null {
  const $ = cheerio.load(html);

  const banInfo = $('span.profile_ban_info').first();
  if (banInfo.length > 0) {
    const text = banInfo.text().replace(/\s+/g, ' ').trim();
    return {
      statusSummary: StatusSummary.BANNED,
      details: text || 'Ban on record',
    };
  }

  if ($('div.profile_private_info').length > 0) {
    return { statusSummary: StatusSummary.PRIVATE, details: 'Profile is private' };
  }

  if ($('div.profile_header_centered_persona').length > 0) {
    return { statusSummary: StatusSummary.CLEAN, details: 'No bans detected' };
  }

  return null;
}
