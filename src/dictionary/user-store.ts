import fs from "node:fs";
import path from "node:path";
import { isSpellError } from "../errors.js";
import { ignoredWordsFileName, userWordsFileName, type ConcreteLanguage } from "../language/catalog.js";
import { withWriteLock } from "./lock.js";
import { readWordListFile, writeWordListFile } from "./wordlist.js";

/**
 * User-scoped word lists kept beside each other in one directory:
 * `user(<code>).txt` for added words and `ignored(<code>).txt` for ignored
 * ones. Writes for a language are serialized; the snapshot is taken inside
 * the lock so the file always reflects the latest in-memory state.
 */
export class UserWordStore {
  private readonly dir: string;

  public constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  public get directory(): string {
    return this.dir;
  }

  public addedPath(language: ConcreteLanguage): string {
    return path.join(this.dir, userWordsFileName(language));
  }

  public ignoredPath(language: ConcreteLanguage): string {
    return path.join(this.dir, ignoredWordsFileName(language));
  }

  public readAdded(language: ConcreteLanguage): string[] {
    return this.readOptional(this.addedPath(language));
  }

  public readIgnored(language: ConcreteLanguage): string[] {
    return this.readOptional(this.ignoredPath(language));
  }

  public async saveAdded(language: ConcreteLanguage, snapshot: () => Iterable<string>): Promise<void> {
    const target = this.addedPath(language);
    await withWriteLock(language.code, () => writeWordListFile(target, [...snapshot()].sort()));
  }

  public async saveIgnored(language: ConcreteLanguage, snapshot: () => Iterable<string>): Promise<void> {
    const target = this.ignoredPath(language);
    await withWriteLock(language.code, () => writeWordListFile(target, [...snapshot()].sort()));
  }

  private readOptional(filePath: string): string[] {
    if (!fs.existsSync(filePath)) return [];
    try {
      return readWordListFile(filePath);
    } catch (error) {
      if (!isSpellError(error)) throw error;
      console.warn("[Dictionary] Ignoring unreadable user word list", filePath, error.message);
      return [];
    }
  }
}
