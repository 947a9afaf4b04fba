/**
 * Schedule Source Fetcher
 *
 * The schedule system needs two form posts per subject, sharing a cookie
 * session: 1) select the term, 2) submit the subject search.
 */

import { CookieJar, type HttpClient } from '../http/client.js';
import type { RawDocument } from '../types.js';

export interface ScheduleSourceConfig {
  baseUrl: string;
  termPath: string;
  searchPath: string;
}

const SUBJECT_PATTERN = /^[A-Za-z]{2,4}$/;

/**
 * Search form fields, in the order the schedule system's own form sends them
 */
export function buildSearchForm(term: string, subject: string): Array<[string, string]> {
  return [
    ['term_in', term],
    ['sel_subj', 'dummy'],
    ['sel_subj', subject.toUpperCase()],
    ['sel_day', 'dummy'],
    ['sel_schd', 'dummy'],
    ['sel_insm', 'dummy'],
    ['sel_camp', '%'],
    ['sel_levl', 'dummy'],
    ['sel_sess', 'dummy'],
    ['sel_instr', '%'],
    ['sel_ptrm', '%'],
    ['sel_attr', 'dummy'],
    ['sel_crse', ''],
    ['sel_title', ''],
    ['sel_from_cred', ''],
    ['sel_to_cred', ''],
    ['begin_hh', '0'],
    ['begin_mi', '0'],
    ['begin_ap', 'a'],
    ['end_hh', '0'],
    ['end_mi', '0'],
    ['end_ap', 'a'],
  ];
}

export class ScheduleFetcher {
  constructor(
    private readonly http: HttpClient,
    private readonly source: ScheduleSourceConfig,
  ) {}

  /**
   * Run the term-select + search sequence for one subject.
   * Throws TransientNetworkError (retryable) or UpstreamError (not retryable).
   */
  async fetchSubject(term: string, subject: string): Promise<RawDocument[]> {
    if (!SUBJECT_PATTERN.test(subject)) {
      throw new RangeError(`Subject code must be 2-4 letters, got "${subject}"`);
    }

    const jar = new CookieJar();

    const termUrl = `${this.source.baseUrl}${this.source.termPath}`;
    const termResponse = await this.http.postForm(
      termUrl,
      [
        ['p_calling_proc', 'bwckschd.p_disp_dyn_sched'],
        ['p_term', term],
      ],
      jar,
    );

    const searchUrl = `${this.source.baseUrl}${this.source.searchPath}`;
    const searchResponse = await this.http.postForm(searchUrl, buildSearchForm(term, subject), jar);

    return [
      { step: 'term', ...termResponse },
      { step: 'search', ...searchResponse },
    ];
  }
}
