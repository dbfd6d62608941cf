import { ContractCase, readContractTests } from '../../test/testHelpers';
import { MemoryToggleStore } from '../configuration-store/memory.store';
import { JsonValue } from '../types';
import { ToggleUser } from '../user';

import ToggleClient, { ToggleDetail } from './toggle-client';

function buildUser(testCase: ContractCase): ToggleUser {
  const user = new ToggleUser().stableRollout(testCase.user.key);
  testCase.user.customValues.forEach(({ key, value }) => user.with(key, value));
  return user;
}

function call(client: ToggleClient, testCase: ContractCase): JsonValue | ToggleDetail<JsonValue> {
  const user = buildUser(testCase);
  const { name, toggle, default: defaultValue } = testCase.function;
  switch (name) {
    case 'bool_value':
      return client.boolValue(toggle, user, defaultValue === true);
    case 'bool_detail':
      return client.boolDetail(toggle, user, defaultValue === true);
    case 'string_value':
      return client.stringValue(toggle, user, String(defaultValue));
    case 'string_detail':
      return client.stringDetail(toggle, user, String(defaultValue));
    case 'number_value':
      return client.numberValue(toggle, user, Number(defaultValue));
    case 'number_detail':
      return client.numberDetail(toggle, user, Number(defaultValue));
    case 'json_value':
      return client.jsonValue(toggle, user, defaultValue);
    case 'json_detail':
      return client.jsonDetail(toggle, user, defaultValue);
  }
}

function isDetail(result: JsonValue | ToggleDetail<JsonValue>): result is ToggleDetail<JsonValue> {
  return typeof result === 'object' && result !== null && 'reason' in result;
}

describe('ToggleClient contract', () => {
  readContractTests().forEach(({ fileName, tests }) => {
    describe(fileName, () => {
      tests.forEach(({ scenario, fixture, cases }) => {
        describe(scenario, () => {
          const client = new ToggleClient(new MemoryToggleStore(fixture));

          const namedCases = cases.map((testCase): [string, ContractCase] => [
            testCase.name,
            testCase,
          ]);

          it.each(namedCases)('%s', (_, testCase) => {
            const expected = testCase.expectResult;
            const result = call(client, testCase);

            if (!testCase.function.name.endsWith('_detail')) {
              expect(result).toEqual(expected.value);
              return;
            }
            expect(isDetail(result)).toBe(true);
            if (!isDetail(result)) {
              return;
            }
            expect(result.value).toEqual(expected.value);
            if (expected.reason !== undefined) {
              expect(result.reason).toContain(expected.reason);
            }
            if (expected.ruleIndex !== undefined) {
              expect(result.ruleIndex).toBe(expected.ruleIndex);
            }
            if (expected.noRuleIndex) {
              expect(result.ruleIndex).toBeNull();
            }
            if (expected.version !== undefined) {
              expect(result.version).toBe(expected.version);
            }
          });
        });
      });
    });
  });
});
