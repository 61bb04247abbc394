import { describe, it, expect } from 'vitest';
import { detectConflicts, extractSectionNames } from '../conflict-detector.js';
import type { RecentChange } from '../../../types/context.js';

const now = new Date('2026-01-01T12:00:00.000Z');
const me = 'ses_20260101110000_aaaaaa';
const other = 'ses_20260101110500_bbbbbb';

function change(minutesAgo: number, extra: Partial<RecentChange> = {}): RecentChange {
  return {
    timestamp: new Date(now.getTime() - minutesAgo * 60_000).toISOString(),
    target: 'PROJECT-CONTEXT',
    sessionId: other,
    ...extra,
  };
}

describe('detectConflicts', () => {
  const base = { target: 'PROJECT-CONTEXT', sessionId: me, newContent: '', windowMinutes: 30, now };

  it('flags a recent change to the same target from another session', () => {
    const recent = [change(5)];
    expect(detectConflicts({ ...base, recent })).toEqual({
      hasConflict: true,
      conflicts: recent,
      overlappingSections: [],
    });
  });

  it('ignores own changes, other targets and changes outside the window', () => {
    const report = detectConflicts({
      ...base,
      recent: [
        change(5, { sessionId: me }),
        change(5, { target: 'PROJECT-ROADMAP' }),
        change(31),
        change(-1),
        change(5, { timestamp: 'not a date' }),
      ],
    });
    expect(report.hasConflict).toBe(false);
    expect(report.conflicts).toEqual([]);
  });

  it('treats anonymous updates as conflicting with every session', () => {
    const report = detectConflicts({ ...base, sessionId: null, recent: [change(1, { sessionId: 'none' })] });
    expect(report.hasConflict).toBe(true);
  });

  it('lists sections touched by both sides', () => {
    const report = detectConflicts({
      ...base,
      newContent: '## Current_State\nnew\n## Decisions\nx',
      recent: [
        change(2, { content: '## CURRENT_STATE\nold\n## Architecture\ny' }),
        change(3),
      ],
    });
    expect(report.conflicts).toHaveLength(2);
    expect(report.overlappingSections).toEqual(['CURRENT_STATE']);
  });

  it('uses section names recorded with a change', () => {
    const report = detectConflicts({
      ...base,
      newContent: '## CURRENT_STATE\nnew',
      recent: [change(2, { sections: ['Current_State', 'DECISIONS'] })],
    });
    expect(report.overlappingSections).toEqual(['Current_State']);
  });
});

describe('extractSectionNames', () => {
  it('reads level-two headings only', () => {
    expect(extractSectionNames('# Title\n## One\ntext\n### Sub\n##   Two  \n')).toEqual(['One', 'Two']);
  });
});
