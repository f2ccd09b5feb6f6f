// src/grouping/synonyms.ts
/**
 * Synonym table for furniture vocabulary.
 *
 * Maps aliases ("ivory", "writing desk", "arts and crafts") onto a canonical
 * term ("white", "desk", "mission") of one of three kinds. Loaded once per
 * process from synonyms.json and read-only afterwards.
 */

import { z } from 'zod';
import rawSynonyms from './synonyms.json';
import { ConfigurationError } from './errors.js';

export type SynonymKind = 'color' | 'furniture' | 'style';

const Section = z.record(z.string().min(1), z.array(z.string().min(1)));

const SynonymFileSchema = z.object({
  colors: Section,
  furniture: Section,
  styles: Section,
});

export type SynonymFile = z.infer<typeof SynonymFileSchema>;

interface Entry {
  canonical: string;
  kind: SynonymKind;
}

/**
 * Lowercase, turn every character other than a-z, 0-9 and '-' into a space,
 * then strip hyphens at word edges.
 */
export function normalizeWords(text?: string | null): string[] {
  return (text || '')
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, ' ')
    .split(/\s+/)
    .map((w) => w.replace(/^-+|-+$/g, ''))
    .filter(Boolean);
}

export class SynonymTable {
  private readonly entries = new Map<string, Entry>();
  private readonly canonicals = new Map<string, SynonymKind>();
  /** Longest alias, in words */
  readonly maxPhraseWords: number;

  constructor(file: SynonymFile) {
    const sections: Array<[SynonymKind, Record<string, string[]>]> = [
      ['color', file.colors],
      ['furniture', file.furniture],
      ['style', file.styles],
    ];

    let maxWords = 1;
    const problems: string[] = [];

    const register = (phrase: string, entry: Entry) => {
      const key = normalizeWords(phrase).join(' ');
      if (!key) {
        problems.push(`empty alias under "${entry.canonical}"`);
        return;
      }
      const existing = this.entries.get(key);
      if (existing) {
        if (existing.canonical !== entry.canonical) {
          problems.push(`"${key}" belongs to both "${existing.canonical}" and "${entry.canonical}"`);
        }
        return;
      }
      this.entries.set(key, entry);
      maxWords = Math.max(maxWords, key.split(' ').length);
    };

    for (const [kind, groups] of sections) {
      for (const canonical of Object.keys(groups)) {
        const words = normalizeWords(canonical);
        if (words.length !== 1 || words[0] !== canonical) {
          problems.push(`canonical term "${canonical}" must be a single normalized word`);
          continue;
        }
        if (this.canonicals.has(canonical)) {
          problems.push(`canonical term "${canonical}" is declared twice`);
          continue;
        }
        this.canonicals.set(canonical, kind);
        register(canonical, { canonical, kind });
      }
    }
    // Aliases after all canonicals so an alias can never shadow a canonical term
    for (const [kind, groups] of sections) {
      for (const [canonical, aliases] of Object.entries(groups)) {
        if (this.canonicals.get(canonical) !== kind) continue;
        for (const alias of aliases) register(alias, { canonical, kind });
      }
    }

    if (problems.length) {
      throw new ConfigurationError(`Malformed synonym table: ${problems.join('; ')}`, { problems });
    }
    this.maxPhraseWords = maxWords;
  }

  /** Canonical term for an already-normalized phrase, if it is known */
  lookup(phrase: string): Entry | undefined {
    return this.entries.get(phrase);
  }

  isFurnitureType(term: string): boolean {
    return this.canonicals.get(term) === 'furniture';
  }

  /**
   * Replace known phrases with their canonical term, longest match first.
   * Repeats until stable so the result is a fixed point.
   */
  canonicalize(words: readonly string[]): string[] {
    let current = words.slice();
    for (;;) {
      const next = this.canonicalizeOnce(current);
      if (next.length === current.length && next.every((w, i) => w === current[i])) return next;
      current = next;
    }
  }

  private canonicalizeOnce(words: readonly string[]): string[] {
    const out: string[] = [];
    let i = 0;
    while (i < words.length) {
      let matched = false;
      const longest = Math.min(this.maxPhraseWords, words.length - i);
      for (let n = longest; n >= 1; n--) {
        const entry = this.entries.get(words.slice(i, i + n).join(' '));
        if (entry) {
          out.push(entry.canonical);
          i += n;
          matched = true;
          break;
        }
      }
      if (!matched) {
        out.push(words[i]);
        i += 1;
      }
    }
    return out;
  }
}

/**
 * Validate raw JSON and build a table. Throws ConfigurationError on any problem.
 */
export function loadSynonymTable(raw: unknown): SynonymTable {
  const parsed = SynonymFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Malformed synonym table: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }
  return new SynonymTable(parsed.data);
}

let defaultTable: SynonymTable | null = null;

/** Process-wide table built from synonyms.json */
export function getSynonymTable(): SynonymTable {
  if (!defaultTable) defaultTable = loadSynonymTable(rawSynonyms);
  return defaultTable;
}
