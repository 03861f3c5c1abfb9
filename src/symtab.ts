/** Storage cell for one variable. Values start at zero. */
export class SymtabEntry {
  private value = 0;

  constructor(public readonly name: string) {}

  public getValue = (): number => this.value;

  public setValue = (value: number): void => {
    this.value = value;
  };
}

/** Flat, case-insensitive symbol table shared by the parser and interpreter */
export class Symtab {
  private entries_ = new Map<string, SymtabEntry>();

  public lookup = (name: string): SymtabEntry | undefined =>
    this.entries_.get(name.toLowerCase());

  // returns the existing entry when the name is already there
  public enter = (name: string): SymtabEntry => {
    const key = name.toLowerCase();
    const existing = this.entries_.get(key);
    if (existing) return existing;
    const entry = new SymtabEntry(name);
    this.entries_.set(key, entry);
    return entry;
  };

  public entries = (): SymtabEntry[] => [...this.entries_.values()];

  public toRecord = (): Record<string, number> => {
    const record: Record<string, number> = {};
    for (const entry of this.entries_.values()) {
      record[entry.name] = entry.getValue();
    }
    return record;
  };
}
