import { describe, it, expect } from 'vitest';
import { artifactRule, compileRuleTable, parseRuleFile } from '../../../src/infrastructure/classification/RuleTable.js';

describe('RuleTable', () => {
  it('should put the artifact rule first when the table detects artifacts', () => {
    const table = compileRuleTable(
      {
        family: 'tool',
        detectArtifacts: true,
        defaults: { stdout: 'INFO', stderr: 'ERROR' },
        rules: [{ id: 'ok', pattern: '^ok$', kind: 'SUCCESS' }],
      },
      ['bin'],
    );

    expect(table.rules.map((r) => r.id)).toEqual(['artifact', 'ok']);
    expect(table.rules[0].requiresSuccess).toBe(true);
  });

  it('should skip the artifact rule unless asked for', () => {
    const table = compileRuleTable(
      { family: 'tool', defaults: { stdout: 'INFO', stderr: 'INFO' }, rules: [] },
      ['bin'],
    );
    expect(table.rules).toEqual([]);
  });

  it('should report invalid patterns with the rule id', () => {
    expect(() => compileRuleTable({
      family: 'gcc',
      defaults: { stdout: 'INFO', stderr: 'INFO' },
      rules: [{ id: 'bad', pattern: '(', kind: 'ERROR' }],
    })).toThrow('Invalid pattern in rule gcc/bad: (');
  });

  it('should reject defaults that are not message kinds', () => {
    expect(() => parseRuleFile({
      artifactExtensions: [],
      tables: [{ family: 'tool', defaults: { stdout: 'INFO', stderr: 'TASK' }, rules: [] }],
    })).toThrow();
  });

  it('should parse a rule file into compiled tables', () => {
    const tables = parseRuleFile({
      artifactExtensions: ['apk'],
      tables: [{ family: 'managed', detectArtifacts: true, defaults: { stdout: 'INFO', stderr: 'INFO' }, rules: [] }],
    });
    expect(tables.map((t) => t.family)).toEqual(['managed']);
    expect(tables[0].rules.map((r) => r.id)).toEqual(['artifact']);
  });

  describe('artifactRule', () => {
    const rule = artifactRule(['apk', 'so', 'exe']);
    const match = (line: string) => rule.regex.exec(line)?.[1];

    it('should capture absolute, relative and drive-letter paths', () => {
      expect(match('/out/app-release.apk')).toBe('/out/app-release.apk');
      expect(match('wrote target/release/libcore.so')).toBe('target/release/libcore.so');
      expect(match('C:\\build\\tool.exe')).toBe('C:\\build\\tool.exe');
    });

    it('should stop at quotes and punctuation', () => {
      expect(match("copied 'dist/app.apk', done")).toBe('dist/app.apk');
      expect(match('(lib/libz.so)')).toBe('lib/libz.so');
    });

    it('should ignore names with other extensions', () => {
      expect(match('app.apk.idsig')).toBeUndefined();
      expect(match('notes.txt')).toBeUndefined();
    });
  });
});
