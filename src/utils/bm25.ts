import { DEFAULT_BM25_B, DEFAULT_BM25_K1, MIN_TOKEN_LENGTH } from "../constants.js";

const REGEX_NON_ALPHANUMERIC = /[^\p{L}\p{N}]+/u;

/**
 * Lowercases, splits on non-alphanumeric runs and drops tokens shorter than two
 * characters. No stemming and no stop words.
 */
export function tokenize(text: string): string[] {
  if (!text) return [];
  return text
    .toLowerCase()
    .split(REGEX_NON_ALPHANUMERIC)
    .filter((token) => token.length >= MIN_TOKEN_LENGTH);
}

/**
 * Okapi BM25 over a tokenized corpus, with corpus-wide inverse document frequency
 * `ln((N - df + 0.5) / (df + 0.5) + 1)`, which stays positive for every term.
 */
export class Bm25Okapi {
  private readonly corpus: ReadonlyArray<ReadonlyArray<string>>;
  private readonly termFrequencies: ReadonlyArray<ReadonlyMap<string, number>>;
  private readonly idf: ReadonlyMap<string, number>;
  private readonly averageLength: number;

  constructor(
    corpus: ReadonlyArray<ReadonlyArray<string>>,
    private readonly k1: number = DEFAULT_BM25_K1,
    private readonly b: number = DEFAULT_BM25_B
  ) {
    this.corpus = corpus;
    this.termFrequencies = corpus.map(countTerms);
    const totalLength = corpus.reduce((sum, document) => sum + document.length, 0);
    this.averageLength = corpus.length > 0 && totalLength > 0 ? totalLength / corpus.length : 1;
    this.idf = this.computeIdf();
  }

  /**
   * Scores every document against the query, in corpus order.
   */
  public getScores(query: ReadonlyArray<string>): number[] {
    const terms = [...new Set(query)];
    return this.corpus.map((document, i) => this.scoreDocument(terms, document.length, this.termFrequencies[i]));
  }

  /** Inverse document frequency of a term, 0 for terms absent from the corpus. */
  public idfOf(term: string): number {
    return this.idf.get(term) ?? 0;
  }

  private scoreDocument(terms: string[], length: number, frequencies: ReadonlyMap<string, number>): number {
    let score = 0;
    const lengthNorm = 1 - this.b + this.b * (length / this.averageLength);
    for (const term of terms) {
      const tf = frequencies.get(term) ?? 0;
      if (tf === 0) continue;
      score += this.idfOf(term) * ((tf * (this.k1 + 1)) / (tf + this.k1 * lengthNorm));
    }
    return score;
  }

  private computeIdf(): Map<string, number> {
    const documentFrequencies = new Map<string, number>();
    for (const frequencies of this.termFrequencies) {
      for (const term of frequencies.keys()) {
        documentFrequencies.set(term, (documentFrequencies.get(term) ?? 0) + 1);
      }
    }

    const n = this.corpus.length;
    const idf = new Map<string, number>();
    for (const [term, df] of documentFrequencies) {
      idf.set(term, Math.log((n - df + 0.5) / (df + 0.5) + 1));
    }
    return idf;
  }
}

function countTerms(document: ReadonlyArray<string>): Map<string, number> {
  const frequencies = new Map<string, number>();
  for (const term of document) {
    frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
  }
  return frequencies;
}
