/**
 * Context that hooks inject into the system prompt (inject key -> text).
 * Session-scoped: a later write for the same key replaces the earlier one.
 */
export class InjectedContext {
  private readonly entries: Map<string, string> = new Map();

  merge(injections: ReadonlyMap<string, string>): void {
    for (const [key, value] of injections) {
      this.entries.set(key, value);
    }
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * "### key\nvalue" sections in insertion order, or '' when empty
   */
  render(): string {
    return Array.from(this.entries, ([key, value]) => `### ${key}\n${value}`).join('\n\n');
  }
}
