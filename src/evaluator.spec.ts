import { readMockRepository } from '../test/testHelpers';

import { EvaluationDetail, Evaluator, isInBucketRange } from './evaluator';
import { Repository, Serve, Toggle } from './interfaces';
import { DeterministicSharder } from './sharders';
import { ToggleUser } from './user';

function makeToggle(overrides: Partial<Toggle> = {}): Toggle {
  return {
    key: 'rollout_toggle',
    enabled: true,
    version: 1,
    disabledServe: { select: 0 },
    defaultServe: { select: 0 },
    rules: [],
    variations: ['a', 'b'],
    ...overrides,
  };
}

function servedValue(detail: EvaluationDetail) {
  return detail.value ? detail.value.toJSON() : null;
}

describe('Evaluator', () => {
  let repository: Repository;
  const evaluator = new Evaluator();

  beforeAll(() => {
    repository = readMockRepository();
  });

  function evaluate(toggleKey: string, user: ToggleUser): EvaluationDetail {
    return evaluator.evaluateToggle(repository.toggles[toggleKey], user, repository.segments);
  }

  describe('rules', () => {
    it('serves the first matching rule', () => {
      const detail = evaluate('bool_toggle', new ToggleUser({ city: '1' }));
      expect(servedValue(detail)).toBe(true);
      expect(detail).toMatchObject({
        variationIndex: 0,
        ruleIndex: 0,
        version: 1,
        reason: 'Rule 0 hit',
      });
    });

    it('serves a later rule through a segment', () => {
      const detail = evaluate('bool_toggle', new ToggleUser({ city: '4' }));
      expect(servedValue(detail)).toBe(false);
      expect(detail).toMatchObject({ variationIndex: 1, ruleIndex: 1, reason: 'Rule 1 hit' });
    });

    it('serves the default when no rule matches', () => {
      const detail = evaluate('bool_toggle', new ToggleUser());
      expect(servedValue(detail)).toBe(true);
      expect(detail).toMatchObject({ ruleIndex: null, reason: 'Default rule hit' });
    });

    it('serves values of every kind', () => {
      const user = new ToggleUser({ city: '4' });
      expect(servedValue(evaluate('string_toggle', user))).toBe('2');
      expect(servedValue(evaluate('number_toggle', user))).toBe(2);
      expect(servedValue(evaluate('json_toggle', user))).toEqual({ theme: 'dark', sizes: [1, 2] });
    });

    it('requires every condition of a rule', () => {
      const staff = new ToggleUser({ email: 'bob@example.com', appVersion: '2.1.0' });
      expect(servedValue(evaluate('staff_toggle', staff))).toBe(true);

      const oldApp = new ToggleUser({ email: 'bob@example.com', appVersion: '1.9.0' });
      const detail = evaluate('staff_toggle', oldApp);
      expect(servedValue(detail)).toBe(false);
      expect(detail.reason).toBe('Default rule hit');
    });
  });

  it('serves the disabled variation of a disabled toggle', () => {
    const detail = evaluate('disabled_toggle', new ToggleUser({ city: '1' }));
    expect(servedValue(detail)).toBe('off');
    expect(detail).toMatchObject({
      variationIndex: 1,
      ruleIndex: null,
      version: 7,
      reason: 'Toggle disabled',
    });
  });

  describe('percentage rollout', () => {
    it.each([
      ['key11', 'a'],
      ['user-1', 'b'],
      ['user-2', 'b'],
      ['user-3', 'c'],
    ])('buckets %s into %s', (key, expected) => {
      const detail = evaluate('split_toggle', new ToggleUser().stableRollout(key));
      expect(servedValue(detail)).toBe(expected);
      expect(detail.reason).toBe('Default rule hit');
    });

    it('serves the same variation on every evaluation', () => {
      const user = new ToggleUser().stableRollout('user-2');
      const first = servedValue(evaluate('split_toggle', user));
      for (let i = 0; i < 5; i++) {
        expect(servedValue(evaluate('split_toggle', user))).toBe(first);
      }
    });

    it('buckets by the configured attribute', () => {
      const user = new ToggleUser({ email: 'alice@example.com' }).stableRollout('key11');
      expect(servedValue(evaluate('bucket_by_toggle', user))).toBe('c');
    });

    it('serves nothing when the bucketing attribute is missing', () => {
      const detail = evaluate('bucket_by_toggle', new ToggleUser().stableRollout('user-1'));
      expect(detail.value).toBeNull();
      expect(detail.variationIndex).toBeNull();
      expect(detail.reason).toBe(
        'User with key user-1 does not have attribute named: [email]',
      );
    });

    it('hashes with the split salt', () => {
      const toggle = makeToggle({
        defaultServe: {
          split: { distribution: [[[0, 5000]], [[5000, 10000]]], salt: 'custom_salt' },
        },
      });
      // bucket 5117
      const detail = evaluator.evaluateToggle(toggle, new ToggleUser().stableRollout('user-1'));
      expect(servedValue(detail)).toBe('b');
    });

    it('treats ranges as half open', () => {
      const serve: Serve = { split: { distribution: [[[0, 4000]], [[4000, 10000]]] } };
      const toggle = makeToggle({ defaultServe: serve });
      const sharder = new DeterministicSharder({
        'user-1rollout_toggle': 3999,
        'user-2rollout_toggle': 4000,
      });
      const deterministic = new Evaluator(sharder);

      const lower = deterministic.evaluateToggle(toggle, new ToggleUser().stableRollout('user-1'));
      const upper = deterministic.evaluateToggle(toggle, new ToggleUser().stableRollout('user-2'));
      expect(lower.variationIndex).toBe(0);
      expect(upper.variationIndex).toBe(1);
    });

    it('reports a bucket that no range covers', () => {
      const toggle = makeToggle({ defaultServe: { split: { distribution: [[[0, 100]]] } } });
      // bucket 8011
      const detail = evaluator.evaluateToggle(toggle, new ToggleUser().stableRollout('user-1'));
      expect(detail.value).toBeNull();
      expect(detail.reason).toBe('Bucket 8011 is not in the split distribution');
    });
  });

  describe('malformed serves', () => {
    it('reports an out of range variation index', () => {
      const toggle = makeToggle({ defaultServe: { select: 5 } });
      const detail = evaluator.evaluateToggle(toggle, new ToggleUser());
      expect(detail).toEqual({
        value: null,
        variationIndex: null,
        ruleIndex: null,
        version: 1,
        reason: 'Variation index 5 overflow, toggle has 2 variations',
      });
    });

    it('keeps the rule index when the rule serve overflows', () => {
      const toggle = makeToggle({
        rules: [{ conditions: [], serve: { select: 2 } }],
      });
      const detail = evaluator.evaluateToggle(toggle, new ToggleUser());
      expect(detail.ruleIndex).toBe(0);
      expect(detail.reason).toBe('Variation index 2 overflow, toggle has 2 variations');
    });

    it('reports a serve with neither a select nor a split', () => {
      const toggle = makeToggle({ disabledServe: {}, enabled: false });
      const detail = evaluator.evaluateToggle(toggle, new ToggleUser());
      expect(detail.value).toBeNull();
      expect(detail.reason).toBe('Serve has neither a select nor a split');
    });
  });

  describe('malformed rules', () => {
    it('treats a condition without objects as not matching', () => {
      const toggle: Toggle = JSON.parse(
        '{"key":"rollout_toggle","enabled":true,"version":1,"disabledServe":{"select":0},' +
          '"defaultServe":{"select":0},"variations":["a","b"],"rules":[{"serve":{"select":1},' +
          '"conditions":[{"type":"string","subject":"city","predicate":"is one of"}]}]}',
      );
      const detail = evaluator.evaluateToggle(toggle, new ToggleUser({ city: '1' }));
      expect(servedValue(detail)).toBe('a');
      expect(detail).toMatchObject({ ruleIndex: null, reason: 'Default rule hit' });
    });

    it('skips a null rule', () => {
      const toggle: Toggle = JSON.parse(
        '{"key":"rollout_toggle","enabled":true,"version":1,"disabledServe":{"select":0},' +
          '"defaultServe":{"select":0},"variations":["a","b"],' +
          '"rules":[null,{"serve":{"select":1},"conditions":[]}]}',
      );
      const detail = evaluator.evaluateToggle(toggle, new ToggleUser());
      expect(servedValue(detail)).toBe('b');
      expect(detail).toMatchObject({ ruleIndex: 1, reason: 'Rule 1 hit' });
    });

    it('ignores distribution entries that are not range lists', () => {
      const toggle: Toggle = JSON.parse(
        '{"key":"rollout_toggle","enabled":true,"version":1,"disabledServe":{"select":0},' +
          '"defaultServe":{"split":{"distribution":[null,"x",[7]]}},"variations":["a","b"]}',
      );
      // bucket 8011
      const detail = evaluator.evaluateToggle(toggle, new ToggleUser().stableRollout('user-1'));
      expect(detail.value).toBeNull();
      expect(detail.reason).toBe('Bucket 8011 is not in the split distribution');
    });
  });
});

describe('isInBucketRange', () => {
  it('includes the lower bound and excludes the upper bound', () => {
    expect(isInBucketRange(0, [0, 10])).toBe(true);
    expect(isInBucketRange(9, [0, 10])).toBe(true);
    expect(isInBucketRange(10, [0, 10])).toBe(false);
    expect(isInBucketRange(5, [5, 5])).toBe(false);
  });
});
