import { describe, it, expect } from 'vitest';
import { MATCH_MODES } from '../src/types/index.js';
import type {
  HistoryEntry,
  RuleConfig,
  FilterRule,
  Decision,
  CleaningStats,
  CleanOutcome,
} from '../src/types/index.js';

describe('types', () => {
  it('MATCH_MODES lists every mode in documentation order', () => {
    expect(MATCH_MODES).toEqual(['exact', 'contains', 'starts_with', 'ends_with', 'regex']);
  });

  it('HistoryEntry shape', () => {
    const e: HistoryEntry = {
      timestamp: '1700000000:0',
      command: 'git status',
      lineNumber: 1,
    };
    expect(e.timestamp).toBe('1700000000:0');
    expect(e.lineNumber).toBe(1);
  });

  it('RuleConfig lists are optional', () => {
    const c: RuleConfig = { allow_list: [{ pattern: 'ls', match_type: 'exact' }] };
    expect(c.ignore_list).toBeUndefined();
    expect(c.allow_list).toHaveLength(1);
  });

  it('FilterRule regex variant carries its expression', () => {
    const r: FilterRule = {
      pattern: '^ls',
      matchMode: 'regex',
      caseSensitive: false,
      regex: /^ls/i,
    };
    expect(r.matchMode === 'regex' && r.regex.test('LS -la')).toBe(true);
  });

  it('Decision shape', () => {
    const d: Decision = { keep: false, reason: 'duplicate' };
    expect(d.keep).toBe(false);
  });

  it('CleanOutcome before anything ran', () => {
    const stats: CleaningStats | null = null;
    const o: CleanOutcome = {
      historyFile: '/tmp/.zsh_history',
      applied: false,
      dryRun: false,
      stats,
      backupFile: null,
    };
    expect(o.applied).toBe(false);
  });
});
