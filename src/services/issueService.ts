import type { TicketCreator, TicketRequest } from '../types/index.js';
import { TicketCreationError } from '../utils/errors.js';

const GITHUB_API = 'https://api.github.com';
const TITLE_MAX = 80;
const SENTENCE_SEPARATORS = ['. ', '! ', '? '];

export interface FormattedIssue {
  title: string;
  body: string;
}

export function formatIssue(request: TicketRequest): FormattedIssue {
  const clean = request.content.split(/\s+/).filter(Boolean).join(' ');

  let title = clean;
  for (const sep of SENTENCE_SEPARATORS) {
    if (title.includes(sep)) {
      title = title.slice(0, title.indexOf(sep));
      break;
    }
  }
  title = title.slice(0, TITLE_MAX).trim() || 'Voice ticket';

  const body =
    `${clean}\n\n---\n` +
    `Source: Discord\n` +
    `From: ${request.author || 'unknown'}\n` +
    `Chat ID: ${request.chatId}\n` +
    `Branch: ${request.branch}\n`;

  return { title, body };
}

/**
 * Creates GitHub issues through the REST API. The returned ticket reference is
 * the issue's html_url.
 */
export function createGitHubTicketCreator(token: string | undefined, fetchImpl: typeof fetch = fetch): TicketCreator {
  return async (request) => {
    if (!token) {
      throw new TicketCreationError('GitHub is not configured (missing GITHUB_TOKEN)');
    }
    const issue = formatIssue(request);
    const response = await fetchImpl(`${GITHUB_API}/repos/${request.ownerRepo}/issues`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ title: issue.title, body: issue.body, labels: request.labels }),
      signal: AbortSignal.timeout(30_000),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new TicketCreationError(`GitHub create issue failed ${response.status}: ${text.slice(0, 500)}`);
    }

    const data: unknown = await response.json();
    if (typeof data !== 'object' || data === null || !('html_url' in data) || typeof data.html_url !== 'string') {
      throw new TicketCreationError('Invalid GitHub response: missing html_url');
    }
    return data.html_url;
  };
}
