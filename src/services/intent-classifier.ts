import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { ValidationError } from '../core/errors.js';
import type { IntentClassification, IntentClassifier } from '../types/model-routing.js';
import type { Embedder } from './embedding-service.js';
import { cosineSimilarity } from './vector-store.js';

export const GENERAL_INTENT = 'general';

/** Intents answered by the assistant shell itself; they never need a specialist. */
export const COMMAND_INTENTS: ReadonlySet<string> = new Set(['help', 'status', 'exit', 'memory', 'clear', 'version']);

const STOPWORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'the', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'with',
  'is', 'am', 'are', 'was', 'were', 'be', 'been', 'being', 'have', 'has', 'had',
  'do', 'does', 'did', 'i', 'you', 'he', 'she', 'it', 'we', 'they', 'my', 'your',
  'his', 'her', 'its', 'our', 'their', 'me', 'him', 'us', 'them',
]);

type IntentTable = ReadonlyMap<string, readonly string[]>;

function readIntentTable(filePath: string): IntentTable {
  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Failed to read intent table at ${resolved}: ${message}`, { cause: error });
  }
  return parseIntentTable(raw);
}

/** `{ intent: string[] }` to a map, lower-casing intents. */
export function parseIntentTable(raw: unknown): IntentTable {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ValidationError('Intent table must be an object of string arrays.');
  }
  const table = new Map<string, readonly string[]>();
  for (const [intent, entries] of Object.entries(raw)) {
    if (!Array.isArray(entries) || !entries.every((entry) => typeof entry === 'string')) {
      throw new ValidationError(`Intent '${intent}' must map to an array of strings.`);
    }
    table.set(
      intent.trim().toLowerCase(),
      entries.map((entry: string) => entry.trim().toLowerCase()).filter((entry) => entry.length > 0),
    );
  }
  return table;
}

export function tokenize(text: string): Set<string> {
  const words = text.toLowerCase().match(/\b\w+\b/g) ?? [];
  return new Set(words.filter((word) => !STOPWORDS.has(word)));
}

/**
 * Counts vocabulary hits per intent. Confidence is the winning intent's share of all
 * hits; no hits yields `general` with confidence 0. Ties go to the intent listed first.
 */
export class KeywordIntentClassifier implements IntentClassifier {
  readonly #vocabulary: IntentTable;

  constructor(vocabulary: IntentTable) {
    this.#vocabulary = vocabulary;
  }

  static fromFile(filePath: string): KeywordIntentClassifier {
    return new KeywordIntentClassifier(readIntentTable(filePath));
  }

  classify(text: string): IntentClassification {
    const words = tokenize(text);
    let bestIntent = GENERAL_INTENT;
    let bestHits = 0;
    let totalHits = 0;

    for (const [intent, keywords] of this.#vocabulary) {
      const hits = keywords.filter((keyword) => words.has(keyword)).length;
      totalHits += hits;
      if (hits > bestHits) {
        bestIntent = intent;
        bestHits = hits;
      }
    }

    if (bestHits === 0) {
      return { intent: GENERAL_INTENT, confidence: 0 };
    }
    return { intent: bestIntent, confidence: bestHits / totalHits };
  }
}

/**
 * Nearest-prototype classifier: embeds a handful of example phrases per intent once,
 * then scores queries by their best cosine similarity to any prototype.
 */
export class EmbeddingIntentClassifier implements IntentClassifier {
  readonly #embedder: Embedder;
  readonly #prototypes: IntentTable;
  #embedded: Promise<Array<{ intent: string; vector: number[] }>> | null = null;

  constructor(embedder: Embedder, prototypes: IntentTable) {
    this.#embedder = embedder;
    this.#prototypes = prototypes;
  }

  static fromFile(embedder: Embedder, filePath: string): EmbeddingIntentClassifier {
    return new EmbeddingIntentClassifier(embedder, readIntentTable(filePath));
  }

  async classify(text: string): Promise<IntentClassification> {
    const prototypes = await this.#loadPrototypes();
    const query = await this.#embedder.embed(text);

    let best: IntentClassification = { intent: GENERAL_INTENT, confidence: 0 };
    for (const prototype of prototypes) {
      const similarity = cosineSimilarity(query, prototype.vector);
      if (similarity > best.confidence) {
        best = { intent: prototype.intent, confidence: similarity };
      }
    }
    return { intent: best.intent, confidence: Math.min(1, best.confidence) };
  }

  #loadPrototypes(): Promise<Array<{ intent: string; vector: number[] }>> {
    if (!this.#embedded) {
      this.#embedded = this.#embedPrototypes().catch((error: unknown) => {
        // Let the next call try again rather than caching the failure.
        this.#embedded = null;
        throw error;
      });
    }
    return this.#embedded;
  }

  async #embedPrototypes(): Promise<Array<{ intent: string; vector: number[] }>> {
    const embedded: Array<{ intent: string; vector: number[] }> = [];
    for (const [intent, phrases] of this.#prototypes) {
      for (const phrase of phrases) {
        embedded.push({ intent, vector: await this.#embedder.embed(phrase) });
      }
    }
    return embedded;
  }
}
