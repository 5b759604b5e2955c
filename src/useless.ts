import uselessMessages from './data/useless-commit-messages.json' with { type: 'json' };

export const USELESS_COMMIT_MESSAGES: readonly string[] = uselessMessages;

const KNOWN = new Set(USELESS_COMMIT_MESSAGES.map((m) => m.toLowerCase()));

/**
 * Exact, case-insensitive match against the list. Surrounding whitespace and
 * trailing `.`/`!` are ignored, so "WIP!" matches but "fix the parser" does not.
 */
export const isUselessCommitMessage = (
  subject: string,
  list: ReadonlySet<string> = KNOWN,
): boolean => {
  const normalized = subject.trim().toLowerCase();
  if (!normalized) return false;
  if (list.has(normalized)) return true;
  const stripped = normalized.replace(/[.!]+$/, '').trimEnd();
  return stripped !== '' && list.has(stripped);
};
