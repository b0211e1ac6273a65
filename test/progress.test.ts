import { describe, expect, it } from 'vitest';

import { TransferProgress } from '../src/progress';

import type { ProgressBar } from '../src/progress';

function recordingBar(events: string[]): ProgressBar {
  return {
    start: (total, startValue) => events.push(`start ${total} ${startValue}`),
    increment: (_step, payload) => events.push(`increment ${JSON.stringify(payload)}`),
    stop: () => events.push('stop'),
  };
}

describe('TransferProgress', () => {
  it('counts completed objects on the bar', () => {
    const events: string[] = [];
    const progress = new TransferProgress(() => recordingBar(events));

    progress.start(2);
    progress.increment('a.txt');
    progress.stop();

    expect(events).toEqual(['start 2 0', 'increment {"file":"a.txt"}', 'stop']);
    expect(progress.active).toBe(false);
  });

  it('stops the bar for a paused task and resumes at the same position', async () => {
    const events: string[] = [];
    const progress = new TransferProgress(() => recordingBar(events));
    progress.start(5);
    progress.increment('a.txt');
    progress.increment('b.txt');

    const result = await progress.pauseFor(async () => {
      events.push('task');
      return 'done';
    });

    expect(result).toBe('done');
    expect(events.slice(3)).toEqual(['stop', 'task', 'start 5 2']);
  });

  it('resumes the bar when the paused task fails', async () => {
    const events: string[] = [];
    const progress = new TransferProgress(() => recordingBar(events));
    progress.start(3);

    await expect(progress.pauseFor(async () => {
      throw new Error('prompt closed');
    })).rejects.toThrow('prompt closed');
    expect(events).toEqual(['start 3 0', 'stop', 'start 3 0']);
  });

  it('does not restart a bar that was stopped during the task', async () => {
    const events: string[] = [];
    const progress = new TransferProgress(() => recordingBar(events));
    progress.start(1);

    await progress.pauseFor(async () => {
      progress.stop();
    });

    expect(events).toEqual(['start 1 0', 'stop', 'stop']);
    expect(progress.active).toBe(false);
  });

  it('runs the task directly when no bar is showing', async () => {
    const events: string[] = [];
    const progress = new TransferProgress(() => recordingBar(events));

    expect(await progress.pauseFor(async () => 42)).toBe(42);
    expect(events).toEqual([]);
  });
});
