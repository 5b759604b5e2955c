import { describe, it, expect } from 'vitest';
import { isUselessCommitMessage, USELESS_COMMIT_MESSAGES } from '../src/useless.js';

describe('isUselessCommitMessage', () => {
  it('flags listed messages regardless of case', () => {
    expect(isUselessCommitMessage('wip')).toBe(true);
    expect(isUselessCommitMessage('WIP')).toBe(true);
    expect(isUselessCommitMessage('fix')).toBe(true);
    expect(isUselessCommitMessage('Minor Fix')).toBe(true);
  });

  it('ignores surrounding whitespace and trailing punctuation', () => {
    expect(isUselessCommitMessage('  changes\n')).toBe(true);
    expect(isUselessCommitMessage('update.')).toBe(true);
    expect(isUselessCommitMessage('wip!!')).toBe(true);
  });

  it('does not flag descriptive messages', () => {
    expect(isUselessCommitMessage('implement retry backoff for flaky uploads')).toBe(false);
  });

  it('matches whole messages only', () => {
    expect(isUselessCommitMessage('I fixed the fix for the fixture')).toBe(false);
    expect(isUselessCommitMessage('fix parser crash on empty input')).toBe(false);
  });

  it('treats an empty subject (no commits yet) as fine', () => {
    expect(isUselessCommitMessage('')).toBe(false);
    expect(isUselessCommitMessage('   ')).toBe(false);
  });

  it('accepts a custom list', () => {
    const list = new Set(['ship it']);
    expect(isUselessCommitMessage('Ship it', list)).toBe(true);
    expect(isUselessCommitMessage('wip', list)).toBe(false);
  });

  it('loads the bundled list', () => {
    expect(USELESS_COMMIT_MESSAGES).toContain('wip');
    expect(USELESS_COMMIT_MESSAGES).toContain('changes');
  });
});
