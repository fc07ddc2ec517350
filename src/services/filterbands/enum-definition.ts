import type { EnumMember, ExtractedEnum } from '../../types/index.js';

/**
 * An enum read from the firmware header. Members are identified by name;
 * the integer value is kept for code generation and reverse lookup.
 */
export class EnumDefinition {
  readonly typeName: string;
  readonly members: readonly EnumMember[];
  private readonly values: ReadonlyMap<string, number>;

  constructor(extracted: ExtractedEnum) {
    this.typeName = extracted.typeName;
    this.members = Object.freeze(extracted.members.map((m) => Object.freeze({ ...m })));
    this.values = new Map(this.members.map((m) => [m.name, m.value]));
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  valueOf(name: string): number | undefined {
    return this.values.get(name);
  }

  /** First member carrying this value (C allows aliases) */
  nameOf(value: number): string | undefined {
    return this.members.find((m) => m.value === value)?.name;
  }

  names(): string[] {
    return this.members.map((m) => m.name);
  }

  toJSON(): ExtractedEnum {
    return {
      typeName: this.typeName,
      members: this.members.map((m) => ({ ...m })),
    };
  }
}
