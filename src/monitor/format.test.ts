import { describe, expect, it } from 'vitest';

import { fmtClock, fmtDuration, fmtMemory, progressBar, stripAnsi } from './format';

describe('format', () => {
  it('formats clock durations', () => {
    expect(fmtClock(0)).toBe('00:00:00');
    expect(fmtClock(3725)).toBe('01:02:05');
    expect(fmtClock(360_000)).toBe('100:00:00');
    expect(fmtClock(-4)).toBe('00:00:00');
  });

  it('formats human durations', () => {
    expect(fmtDuration(45)).toBe('45s');
    expect(fmtDuration(125)).toBe('2m 5s');
    expect(fmtDuration(3780)).toBe('1h 3m');
  });

  it('truncates memory sizes', () => {
    expect(fmtMemory(512)).toBe('512B');
    expect(fmtMemory(12 * 1024 + 900)).toBe('12KB');
    expect(fmtMemory(300 * 1024 * 1024)).toBe('300MB');
    expect(fmtMemory(2.5 * 1024 * 1024 * 1024)).toBe('2GB');
  });

  it('draws a bar with a head while incomplete', () => {
    expect(progressBar(50, 10)).toBe('[=====>    ] 50%');
    expect(progressBar(0, 4)).toBe('[>   ] 0%');
    expect(progressBar(100, 4)).toBe('[====] 100%');
    expect(progressBar(140, 4)).toBe('[====] 100%');
  });

  it('strips colour codes', () => {
    expect(stripAnsi('\u001b[32mok\u001b[39m')).toBe('ok');
  });
});
