import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RuleTableDefectError } from './errors';
import { loadRuleTable, parseRuleTable } from './rule-table-loader';
import { matchRule } from './rules';

const RULES_DIR = path.resolve(__dirname, '..', '..', '..', '..', 'rules');

describe('parseRuleTable', () => {
  it('should compile a valid table', () => {
    const table = parseRuleTable(
      {
        rules: [
          { pattern: 'll', output: ['ʎ', 'ʝ'], consume: 2 },
          { context: '^|\\s', pattern: 'd', output: 'd' },
        ],
      },
      'inline',
    );

    expect(table).toHaveLength(2);
    expect(table[0].output).toEqual(['ʎ', 'ʝ']);
    expect(table[0].consume).toBe(2);
    expect(matchRule(table[1], '', 'dedo')).toBe('d');
    expect(matchRule(table[1], 'de', 'do')).toBeNull();
  });

  it('should name the offending property', () => {
    expect(() => parseRuleTable({ rules: [{ output: 'x' }] }, 'broken.json')).toThrow(
      'rules.0.pattern: pattern must be a string',
    );
    expect(() => parseRuleTable({ rules: [{ pattern: 'a', output: 3 }] }, 'broken.json')).toThrow(
      'rules.0.output',
    );
  });

  it('should reject a file without a rules array', () => {
    expect(() => parseRuleTable([], 'list.json')).toThrow(RuleTableDefectError);
    expect(() => parseRuleTable({ rule: [] }, 'typo.json')).toThrow('typo.json: invalid rule table');
  });

  it('should reject unknown rule properties', () => {
    const misspelled = {
      rules: [
        { pattern: 'c[ie]', output: 's', consumed: 1 },
        { pattern: 'i', output: 'i' },
      ],
    };

    expect(() => parseRuleTable(misspelled, 'typo.json')).toThrow(RuleTableDefectError);
    expect(() => parseRuleTable(misspelled, 'typo.json')).toThrow(
      'rules.0.consumed: property consumed should not exist',
    );
  });

  it('should not check consumed lengths at load time', () => {
    const table = parseRuleTable({ rules: [{ pattern: 'a', output: 'a', consume: 0 }] }, 'inline');
    expect(table[0].consume).toBe(0);
  });
});

describe('loadRuleTable', () => {
  it('should load the bundled tables', () => {
    expect(loadRuleTable(RULES_DIR, 'es.json')).toHaveLength(54);
    expect(loadRuleTable(RULES_DIR, 'en.json')).toHaveLength(86);
    expect(loadRuleTable(RULES_DIR, 'mr.json')).toHaveLength(94);
  });

  it('should report malformed JSON as a table defect', () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'rule-tables-'));
    fs.writeFileSync(path.join(directory, 'bad.json'), '{ "rules": [');

    try {
      expect(() => loadRuleTable(directory, 'bad.json')).toThrow(RuleTableDefectError);
    } finally {
      fs.rmSync(directory, { recursive: true, force: true });
    }
  });

  it('should report a missing file as a table defect', () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'rule-tables-'));

    try {
      expect(() => loadRuleTable(directory, 'missing.json')).toThrow(
        expect.objectContaining({ kind: 'table-file' }),
      );
      expect(() => loadRuleTable(directory, 'missing.json')).toThrow('missing.json: ENOENT');
    } finally {
      fs.rmSync(directory, { recursive: true, force: true });
    }
  });
});
