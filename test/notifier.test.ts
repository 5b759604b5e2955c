import { describe, it, expect } from 'vitest';
import { DebouncedNotifier, DEBOUNCE_INTERVAL_MS } from '../src/notifier.js';
import { RecordingSink } from './helpers.js';

function setup(level?: 'info' | 'warn' | 'error') {
  let t = 0;
  const sink = new RecordingSink();
  const notifier = new DebouncedNotifier(sink, { level, now: () => t });
  const at = async (ms: number, message: string) => {
    t = ms;
    return notifier.notify(message);
  };
  return { sink, at };
}

describe('DebouncedNotifier', () => {
  it('uses a 500ms window', () => {
    expect(DEBOUNCE_INTERVAL_MS).toBe(500);
  });

  it('delivers the first message of a fresh notifier', async () => {
    const { sink, at } = setup();
    expect(await at(0, 'first')).toBe(true);
    expect(sink.notifications).toEqual([{ message: 'first', level: 'warn' }]);
  });

  it('chains suppression off the latest call, not the latest delivery', async () => {
    const { sink, at } = setup();
    await at(0, 'a');
    expect(await at(400, 'b')).toBe(false);
    expect(await at(800, 'c')).toBe(false);
    expect(sink.messages()).toEqual(['a']);
  });

  it('delivers again once a gap longer than the window follows a call', async () => {
    const { sink, at } = setup();
    await at(0, 'a');
    await at(300, 'b');
    await at(900, 'c');
    await at(1200, 'd');
    await at(1500, 'e');
    expect(sink.messages()).toEqual(['a', 'c']);
  });

  it('keeps suppressing while a burst continues, then resumes', async () => {
    const { sink, at } = setup();
    await at(0, 'a');
    await at(200, 'b');
    await at(400, 'c');
    await at(901, 'd');
    expect(sink.messages()).toEqual(['a', 'd']);
  });

  it('suppresses a call exactly one window after the previous one', async () => {
    const { sink, at } = setup();
    await at(0, 'a');
    expect(await at(500, 'b')).toBe(false);
    expect(sink.messages()).toEqual(['a']);
  });

  it('forwards the configured level', async () => {
    const { sink, at } = setup('error');
    await at(0, 'a');
    expect(sink.notifications[0].level).toBe('error');
  });
});
