import { JsonValue } from './types';

export enum ToggleValueType {
  BoolType = 'BOOLEAN',
  NumericType = 'NUMBER',
  StringType = 'STRING',
  JSONType = 'JSON',
}

type TaggedValue =
  | { type: ToggleValueType.BoolType; value: boolean }
  | { type: ToggleValueType.NumericType; value: number }
  | { type: ToggleValueType.StringType; value: string }
  | { type: ToggleValueType.JSONType; value: JsonValue };

/**
 * A served variation value tagged with its kind.
 *
 * Each accessor kind has exactly one conversion (`asBool`, `asNumber`, `asString`, `asJSON`);
 * a conversion returns `undefined` when the kind does not match, and the JSON conversion
 * accepts every kind.
 */
export class ToggleValue {
  private constructor(private readonly tagged: TaggedValue) {}

  get valueType(): ToggleValueType {
    return this.tagged.type;
  }

  static of(value: JsonValue): ToggleValue {
    switch (typeof value) {
      case 'boolean':
        return ToggleValue.Bool(value);
      case 'number':
        return ToggleValue.Numeric(value);
      case 'string':
        return ToggleValue.String(value);
      default:
        return ToggleValue.JSON(value);
    }
  }

  static Bool(value: boolean): ToggleValue {
    return new ToggleValue({ type: ToggleValueType.BoolType, value });
  }

  static Numeric(value: number): ToggleValue {
    return new ToggleValue({ type: ToggleValueType.NumericType, value });
  }

  static String(value: string): ToggleValue {
    return new ToggleValue({ type: ToggleValueType.StringType, value });
  }

  static JSON(value: JsonValue): ToggleValue {
    return new ToggleValue({ type: ToggleValueType.JSONType, value });
  }

  asBool(): boolean | undefined {
    return this.tagged.type === ToggleValueType.BoolType ? this.tagged.value : undefined;
  }

  asNumber(): number | undefined {
    return this.tagged.type === ToggleValueType.NumericType ? this.tagged.value : undefined;
  }

  asString(): string | undefined {
    return this.tagged.type === ToggleValueType.StringType ? this.tagged.value : undefined;
  }

  asJSON(): JsonValue {
    return this.tagged.value;
  }

  toJSON(): JsonValue {
    return this.tagged.value;
  }

  toString(): string {
    switch (this.tagged.type) {
      case ToggleValueType.BoolType:
        return this.tagged.value ? 'true' : 'false';
      case ToggleValueType.NumericType:
        return this.tagged.value.toString();
      case ToggleValueType.StringType:
        return this.tagged.value;
      case ToggleValueType.JSONType:
        return JSON.stringify(this.tagged.value) ?? '';
    }
  }
}
