import { promises as fs } from 'fs';
import { ConfigError, errorMessage } from '../../models/errors';
import { KeywordCategory, KeywordSet, KeywordSnapshot } from '../../types/models';
import { tokenize } from '../scoring/Tokenizer';

export type KeywordSources = Record<KeywordCategory, string>;

const CATEGORIES: KeywordCategory[] = ['complaint', 'subject', 'urgency', 'negation'];

/**
 * Normalizes raw keyword lines: comments and blank lines are dropped,
 * terms are lowercased and reduced to the same tokens the scorer sees.
 */
export function normalizeTerms(lines: string[]): Set<string> {
  const terms = new Set<string>();
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const term = tokenize(trimmed).join(' ');
    if (term) terms.add(term);
  }
  return terms;
}

export function validateKeywordSet(keywords: KeywordSet): void {
  if (keywords.complaint.size === 0) {
    throw new ConfigError('Complaint keyword list is empty');
  }

  const overlapping: string[] = [];
  for (const term of keywords.negation) {
    for (const category of ['complaint', 'subject', 'urgency'] as const) {
      if (keywords[category].has(term)) {
        overlapping.push(`"${term}" (${category})`);
      }
    }
  }
  if (overlapping.length > 0) {
    throw new ConfigError(`Negation terms also listed as signal terms: ${overlapping.join(', ')}`, overlapping);
  }
}

export async function loadKeywords(sources: KeywordSources): Promise<KeywordSet> {
  const loaded = await Promise.all(
    CATEGORIES.map(async category => {
      let contents: string;
      try {
        contents = await fs.readFile(sources[category], 'utf-8');
      } catch (error) {
        throw new ConfigError(`Keyword file not found or unreadable: ${sources[category]} (${errorMessage(error)})`);
      }
      return normalizeTerms(contents.split(/\r?\n/));
    })
  );

  const [complaint, subject, urgency, negation] = loaded;
  const keywords: KeywordSet = { complaint, subject, urgency, negation };
  validateKeywordSet(keywords);
  return keywords;
}

/**
 * Holds the active keyword snapshot. Readers take `current()` once per
 * message and keep that reference, so a reload never changes the terms
 * mid-classification.
 */
export class KeywordStore {
  private snapshot: KeywordSnapshot;

  constructor(
    private sources: KeywordSources,
    keywords: KeywordSet,
    adjustments: ReadonlyMap<string, number> = new Map()
  ) {
    validateKeywordSet(keywords);
    this.snapshot = freezeSnapshot(1, keywords, adjustments);
  }

  static async create(
    sources: KeywordSources,
    adjustments: ReadonlyMap<string, number> = new Map()
  ): Promise<KeywordStore> {
    const keywords = await loadKeywords(sources);
    const store = new KeywordStore(sources, keywords, adjustments);
    console.log(`✅ Keywords loaded: ${describe(keywords)}`);
    return store;
  }

  current(): KeywordSnapshot {
    return this.snapshot;
  }

  /**
   * Re-reads the keyword files. On failure the previous snapshot stays active.
   */
  async refresh(): Promise<KeywordSnapshot> {
    const keywords = await loadKeywords(this.sources);
    this.snapshot = freezeSnapshot(this.snapshot.generation + 1, keywords, this.snapshot.adjustments);
    console.log(`🔄 Keywords reloaded (generation ${this.snapshot.generation}): ${describe(keywords)}`);
    return this.snapshot;
  }

  /**
   * Merges changed multipliers into the active snapshot. Entries not in
   * `changes` keep their current value.
   */
  applyAdjustments(changes: ReadonlyMap<string, number>): KeywordSnapshot {
    const adjustments = new Map(this.snapshot.adjustments);
    for (const [key, multiplier] of changes) {
      adjustments.set(key, multiplier);
    }
    this.snapshot = freezeSnapshot(this.snapshot.generation + 1, this.snapshot.keywords, adjustments);
    return this.snapshot;
  }
}

function freezeSnapshot(
  generation: number,
  keywords: KeywordSet,
  adjustments: ReadonlyMap<string, number>
): KeywordSnapshot {
  return Object.freeze({
    generation,
    keywords: Object.freeze({
      complaint: new Set(keywords.complaint),
      subject: new Set(keywords.subject),
      urgency: new Set(keywords.urgency),
      negation: new Set(keywords.negation)
    }),
    adjustments: new Map(adjustments)
  });
}

function describe(keywords: KeywordSet): string {
  return CATEGORIES.map(category => `${keywords[category].size} ${category}`).join(', ');
}
