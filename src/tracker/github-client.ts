import type { TrackerRepo } from '../types.js';
import { ConfigurationError, TrackerFetchError, errorMessage } from '../errors.js';

const DEFAULT_API_BASE = 'https://api.github.com';
const USER_AGENT = 'crash-audit/0.1';
const PER_PAGE = 100;
const REQUEST_TIMEOUT_MS = 30_000;

export interface PageProgress {
  page: number;
  pageItems: number;
  totalSoFar: number;
}

export interface FetchOpenIssuesOptions extends TrackerRepo {
  token?: string;
  apiBaseUrl?: string;
  fetchImpl?: typeof fetch;
  onPage?: (progress: PageProgress) => void;
}

interface IssueItem {
  number: number;
  pull_request?: unknown;
}

/** Parses "owner/name" into a TrackerRepo. */
export function parseTrackerRepo(raw: string): TrackerRepo {
  const match = /^([\w.-]+)\/([\w.-]+)$/.exec(raw.trim());
  if (!match || !match[1] || !match[2]) {
    throw new ConfigurationError(`Invalid tracker repository "${raw}" (expected owner/name)`);
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * Fetches the numbers of every open issue, following GitHub's `Link` header
 * page by page. Pull requests share the issue list endpoint and are dropped.
 *
 * Any failed page aborts the whole fetch: a snapshot with a gap in it would
 * make closed-looking issues out of open ones.
 */
export async function fetchOpenIssues(options: FetchOpenIssuesOptions): Promise<Set<number>> {
  const { owner, repo, token, onPage } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  const base = (options.apiBaseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, '');

  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'User-Agent': USER_AGENT,
  };
  if (token) headers['Authorization'] = `Bearer ${token}`;

  const open = new Set<number>();
  let url: string | null =
    `${base}/repos/${owner}/${repo}/issues?state=open&per_page=${PER_PAGE}`;
  let page = 0;

  while (url) {
    page++;

    let res: Response;
    try {
      res = await fetchImpl(url, { headers, signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    } catch (err) {
      throw new TrackerFetchError(
        `Failed to fetch open issues (page ${page}): ${errorMessage(err)}`,
        { page, cause: err }
      );
    }

    if (!res.ok) throw httpError(res, page);

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new TrackerFetchError(`Invalid JSON in open issues response (page ${page})`, { page, cause: err });
    }
    if (!Array.isArray(body)) {
      throw new TrackerFetchError(`Unexpected open issues response (page ${page}): not a list`, { page });
    }

    for (const item of body) {
      if (!isIssueItem(item) || item.pull_request !== undefined) continue;
      open.add(item.number);
    }

    onPage?.({ page, pageItems: body.length, totalSoFar: open.size });
    url = nextPageUrl(res.headers.get('link'));
  }

  return open;
}

function isIssueItem(value: unknown): value is IssueItem {
  return typeof value === 'object' && value !== null && 'number' in value &&
    typeof value.number === 'number' && Number.isSafeInteger(value.number);
}

/** Extracts the rel="next" target from an RFC 8288 Link header. */
export function nextPageUrl(link: string | null): string | null {
  if (!link) return null;
  for (const part of link.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?([^";]+)"?/.exec(part.trim());
    if (match && match[2]?.split(/\s+/).includes('next')) return match[1] ?? null;
  }
  return null;
}

function httpError(res: Response, page: number): TrackerFetchError {
  if (res.status === 401) {
    return new TrackerFetchError(
      `GitHub rejected the access token (HTTP 401, page ${page})`,
      { page }
    );
  }

  const remaining = res.headers.get('x-ratelimit-remaining');
  if (res.status === 429 || (res.status === 403 && remaining === '0')) {
    const reset = Number(res.headers.get('x-ratelimit-reset'));
    const until = Number.isFinite(reset) && reset > 0
      ? ` until ${new Date(reset * 1000).toISOString()}`
      : '';
    return new TrackerFetchError(
      `GitHub rate limit exceeded${until} (HTTP ${res.status}, page ${page}); set GITHUB_TOKEN for a higher limit`,
      { page }
    );
  }

  return new TrackerFetchError(
    `Failed to fetch open issues (HTTP ${res.status} ${res.statusText}, page ${page})`,
    { page }
  );
}
