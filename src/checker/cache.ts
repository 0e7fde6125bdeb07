/**
 * Memo of correctness verdicts keyed by language code and normalized word.
 * Entries never expire; the checker clears the whole cache whenever the
 * verdicts it holds could change (language switch, reload, import,
 * case-sensitivity change). Oldest entries are evicted past `maxEntries`.
 */
export class CorrectnessCache {
  private readonly entries = new Map<string, boolean>();
  private readonly maxEntries: number;

  constructor(options?: { maxEntries?: number }) {
    this.maxEntries = Math.max(1, Math.floor(options?.maxEntries ?? 100_000));
  }

  public static key(languageCode: string, word: string): string {
    return `${languageCode}_${word}`;
  }

  public get(languageCode: string, word: string): boolean | null {
    return this.entries.get(CorrectnessCache.key(languageCode, word)) ?? null;
  }

  public has(languageCode: string, word: string): boolean {
    return this.entries.has(CorrectnessCache.key(languageCode, word));
  }

  public set(languageCode: string, word: string, isCorrect: boolean): void {
    const key = CorrectnessCache.key(languageCode, word);
    this.entries.delete(key);
    this.entries.set(key, isCorrect);
    this.evictIfNeeded();
  }

  public invalidate(languageCode: string, word: string): void {
    this.entries.delete(CorrectnessCache.key(languageCode, word));
  }

  /** Drop every verdict for one language. */
  public invalidateLanguage(languageCode: string): void {
    const prefix = `${languageCode}_`;
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) this.entries.delete(key);
    }
  }

  public clear(): void {
    this.entries.clear();
  }

  public size(): number {
    return this.entries.size;
  }

  private evictIfNeeded(): void {
    // Map iteration follows insertion order, so the first keys are the oldest.
    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) return;
      this.entries.delete(key);
    }
  }
}
