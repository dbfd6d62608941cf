import { ToggleValue, ToggleValueType } from './toggle-value';

describe('ToggleValue', () => {
  it('tags values by kind', () => {
    expect(ToggleValue.of(true).valueType).toBe(ToggleValueType.BoolType);
    expect(ToggleValue.of(1.5).valueType).toBe(ToggleValueType.NumericType);
    expect(ToggleValue.of('on').valueType).toBe(ToggleValueType.StringType);
    expect(ToggleValue.of({ a: 1 }).valueType).toBe(ToggleValueType.JSONType);
    expect(ToggleValue.of([1, 2]).valueType).toBe(ToggleValueType.JSONType);
    expect(ToggleValue.of(null).valueType).toBe(ToggleValueType.JSONType);
  });

  it('converts only to its own kind', () => {
    const value = ToggleValue.of('on');
    expect(value.asString()).toBe('on');
    expect(value.asBool()).toBeUndefined();
    expect(value.asNumber()).toBeUndefined();
  });

  it('keeps false and zero', () => {
    expect(ToggleValue.of(false).asBool()).toBe(false);
    expect(ToggleValue.of(0).asNumber()).toBe(0);
    expect(ToggleValue.of('').asString()).toBe('');
  });

  it('converts every kind to JSON', () => {
    expect(ToggleValue.of(3).asJSON()).toBe(3);
    expect(ToggleValue.of({ theme: 'dark' }).asJSON()).toEqual({ theme: 'dark' });
    expect(JSON.stringify({ v: ToggleValue.of([1, 'a']) })).toBe('{"v":[1,"a"]}');
  });

  it('renders as a string', () => {
    expect(ToggleValue.of(true).toString()).toBe('true');
    expect(ToggleValue.of(12).toString()).toBe('12');
    expect(ToggleValue.of('on').toString()).toBe('on');
    expect(ToggleValue.of({ a: [1] }).toString()).toBe('{"a":[1]}');
  });
});
