/**
 * Unit tests for validation.ts input schemas
 */
import { parseGroups, parseKillRules, parsePathRequest } from './validation';
import { MalformedInputError } from './errors';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof MalformedInputError) return err.issues;
    throw err;
  }
  throw new Error('Expected MalformedInputError');
}

describe('parseGroups', () => {
  it('should accept well-formed groups', () => {
    const groups = [
      { type: 'archers', amount: 7, team: 'blue' },
      { type: 'typeless', amount: 0, team: 'red' },
    ];
    expect(parseGroups(groups)).toEqual(groups);
  });

  it('should reject a missing amount', () => {
    expect(issuesOf(() => parseGroups([{ type: 'archers', team: 'blue' }]))).toEqual(['0.amount: Required']);
  });

  it('should reject negative amounts', () => {
    expect(issuesOf(() => parseGroups([{ type: 'archers', amount: -1, team: 'blue' }]))).toEqual([
      '0.amount: Amount cannot be negative',
    ]);
  });

  it('should reject fractional amounts', () => {
    expect(issuesOf(() => parseGroups([{ type: 'archers', amount: 1.5, team: 'blue' }]))).toEqual([
      '0.amount: Amount must be a whole number',
    ]);
  });

  it('should reject unknown team labels', () => {
    const issues = issuesOf(() => parseGroups([{ type: 'archers', amount: 2, team: 'green' }]));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('0.team: Invalid enum value')).toBe(true);
  });

  it('should reject input that is not a list', () => {
    expect(issuesOf(() => parseGroups('archers'))).toEqual(['Expected array, received string']);
  });

  it('should cap the number of groups', () => {
    const group = { type: 'archers', amount: 1, team: 'blue' };
    expect(issuesOf(() => parseGroups([group, group, group], 2))).toEqual(['At most 2 groups can be searched']);
  });

  it('should summarize issues in the error message', () => {
    expect(() => parseGroups([{ type: 'archers', team: 'blue' }])).toThrow('Invalid groups: 0.amount: Required');
  });
});

describe('parseKillRules', () => {
  it('should accept well-formed rules', () => {
    const rules = [{ attacker: 'archers', defender: 'warriors', unitsRequired: 2, killsDealt: 3 }];
    expect(parseKillRules(rules)).toEqual(rules);
  });

  it('should require at least one attacking unit per round', () => {
    expect(
      issuesOf(() => parseKillRules([{ attacker: 'archers', defender: 'warriors', unitsRequired: 0, killsDealt: 3 }]))
    ).toEqual(['0.unitsRequired: At least one attacking unit is required']);
  });
});

describe('parsePathRequest', () => {
  it('should default options to an empty object', () => {
    const request = parsePathRequest({ groups: [{ type: 'archers', amount: 3, team: 'red' }] });
    expect(request.options).toEqual({});
    expect(request.rules).toBeUndefined();
  });

  it('should reject a missing body', () => {
    expect(issuesOf(() => parsePathRequest(undefined))).toEqual(['groups: Required']);
  });

  it('should reject unknown search modes', () => {
    const issues = issuesOf(() => parsePathRequest({ groups: [], options: { mode: 'random' } }));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('options.mode: Invalid enum value')).toBe(true);
  });
});

describe('Shared schemas', () => {
  it('should reject the same rule in a request as in a rule list', () => {
    const rule = { attacker: 'archers', defender: 'warriors', unitsRequired: 0, killsDealt: 3 };
    expect(issuesOf(() => parsePathRequest({ groups: [], rules: [rule] }))).toEqual([
      'rules.0.unitsRequired: At least one attacking unit is required',
    ]);
  });

  it('should cap groups in a request the same way as a group list', () => {
    const group = { type: 'archers', amount: 1, team: 'blue' };
    expect(issuesOf(() => parsePathRequest({ groups: [group, group, group] }, 2))).toEqual([
      'groups: At most 2 groups can be searched',
    ]);
  });
});
