/**
 * One batch row: keys in insertion order, each mapped to its value as JSON
 * text. Values read from the input keep their source text, so integer-like
 * keys stay where they were and numbers keep every digit.
 */
export class BatchRow {
  private readonly fields = new Map<string, string>();

  static fromEntries(entries: Iterable<readonly [string, unknown]>): BatchRow {
    const row = new BatchRow();
    for (const [key, value] of entries) row.set(key, value);
    return row;
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  keys(): string[] {
    return [...this.fields.keys()];
  }

  /** Decoded value, or undefined when the key is absent. */
  get(key: string): unknown {
    const text = this.fields.get(key);
    return text === undefined ? undefined : JSON.parse(text);
  }

  /** Source text of a value, or undefined when the key is absent. */
  getRaw(key: string): string | undefined {
    return this.fields.get(key);
  }

  /**
   * Set a value. An existing key keeps its position.
   */
  set(key: string, value: unknown): void {
    this.fields.set(key, JSON.stringify(value));
  }

  /** Set a value from JSON text that is already valid. */
  setRaw(key: string, json: string): void {
    this.fields.set(key, json);
  }

  clone(): BatchRow {
    const copy = new BatchRow();
    for (const [key, json] of this.fields) copy.setRaw(key, json);
    return copy;
  }

  /** Compact single-line JSON object, keys in row order. */
  toLine(): string {
    const members = [...this.fields].map(
      ([key, json]) => `${JSON.stringify(key)}:${json}`,
    );
    return `{${members.join(",")}}`;
  }
}
