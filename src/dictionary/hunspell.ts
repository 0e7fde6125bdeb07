/**
 * hunspell.ts
 *
 * Affix-aware word membership backed by nspell (Hunspell in JavaScript).
 * A plain word list only knows the forms it lists; a Hunspell dictionary also
 * accepts inflections ("walked", "walking") derived through its affix rules.
 *
 * Dictionaries can attach an oracle; it is consulted after set membership and
 * its suggestions join the suggestion candidate pool.
 *
 * The bundled English dictionary (dictionary-en) is loaded once per process
 * and cached.
 */

import nspell from "nspell";

export interface AffixOracle {
  correct(word: string): boolean;
  suggest(word: string): string[];
}

export function createAffixOracle(aff: string | Buffer, dic: string | Buffer): AffixOracle {
  const spell = nspell(aff, dic);
  return {
    correct: (word) => spell.correct(word),
    suggest: (word) => spell.suggest(word),
  };
}

let _bundled: AffixOracle | null = null;
let _bundledLoading: Promise<AffixOracle> | null = null;

export async function loadBundledEnglishOracle(): Promise<AffixOracle> {
  if (_bundled) return _bundled;
  if (_bundledLoading) return _bundledLoading;

  _bundledLoading = (async () => {
    const { default: dict } = await import("dictionary-en");
    _bundled = createAffixOracle(Buffer.from(dict.aff), Buffer.from(dict.dic));
    return _bundled;
  })();

  try {
    return await _bundledLoading;
  } finally {
    _bundledLoading = null;
  }
}
