import { EmptySelectionError, InvalidActionError, UnknownCommitError } from '../errors.js';
import { shortId, type CommitAction, type CommitEntry } from '../state/record.js';

export interface SelectableCommit {
  readonly id: string;
  readonly summary: string;
}

const COMMENT_MARKER = '#';

const HEADER = [
  '# Interactive rebranch - edit the list of commits to apply',
  '# Commands:',
  '#  pick, p = apply this commit',
  '#  drop, d = skip this commit',
  '#',
  '# Commits are applied top to bottom; reorder lines to change the order.',
  '# Merge commits cannot be applied; drop them.',
  '# Lines starting with # are ignored.',
  '',
];

const ACTION_TOKENS = new Map<string, CommitAction>([
  ['pick', 'apply'],
  ['p', 'apply'],
  ['drop', 'skip'],
  ['d', 'skip'],
]);

/**
 * Render commits (oldest first) as an editable listing, one `pick <shortId> <summary>` line each.
 */
export function renderSelection(commits: readonly SelectableCommit[]): string {
  const lines = [...HEADER, ...commits.map((c) => `pick ${shortId(c.id)} ${c.summary}`)];
  return lines.join('\n') + '\n';
}

/**
 * Parse an edited listing back into an ordered plan.
 *
 * Line order is replay order. Summaries in the text are informational only; the
 * authoritative summary comes from `originalCommits`.
 */
export function parseSelection(text: string, originalCommits: readonly SelectableCommit[]): CommitEntry[] {
  const selected: CommitEntry[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.trim();
    if (line === '' || line.startsWith(COMMENT_MARKER)) return;

    const [actionToken = '', idToken] = line.split(/\s+/);
    if (idToken === undefined) {
      throw new InvalidActionError(
        `Invalid line ${lineNumber}: expected "<action> <commit>" but found "${line}"`,
        lineNumber,
        actionToken,
      );
    }

    const action = ACTION_TOKENS.get(actionToken);
    if (action === undefined) {
      throw new InvalidActionError(
        `Invalid action '${actionToken}' on line ${lineNumber} (must be 'pick', 'p', 'drop', or 'd')`,
        lineNumber,
        actionToken,
      );
    }

    const original = findCommit(idToken, originalCommits, lineNumber);
    selected.push({ id: original.id, summary: original.summary, action });
  });

  if (selected.length === 0) {
    throw new EmptySelectionError('No commits selected (all lines were empty or comments)');
  }

  return selected;
}

function findCommit(token: string, commits: readonly SelectableCommit[], lineNumber: number): SelectableCommit {
  const key = token.toLowerCase();
  const matches = commits.filter((c) => shortId(c.id) === shortId(key) && c.id.startsWith(key));

  const [match] = matches;
  if (matches.length === 1 && match) {
    return match;
  }

  const reason = matches.length > 1 ? 'ambiguous commit' : 'unknown commit';
  throw new UnknownCommitError(`${reason} ${token} on line ${lineNumber}`, lineNumber, token);
}
