/**
 * MinHash Signature Generation
 *
 * Uses the MinHash algorithm to compress a document's shingle set into a
 * fixed-length signature whose positional agreement with another signature
 * estimates the Jaccard similarity of the two sets.
 *
 * Algorithm:
 * 1. Start every signature slot at the sentinel p + 1
 * 2. For each hash function i and each shingle s, compute h_i(s)
 * 3. Keep the minimum value per slot
 *
 * Cost is O(numDocs * numHashes * avgShingleSetSize).
 */

import { ConfigurationError } from '../../types/errors';
import { throwIfCancelled, type CancellableOptions } from './cancellation';
import { mulAddMod, type HashFunctionFamily } from './hashFamily';
import type { ShingleSet } from './shingles';

/** One minimum per hash function. Float64 because the sentinel exceeds 2^32. */
export type Signature = Float64Array;

export interface DocumentShingles {
  id: number;
  shingles: ShingleSet;
}

/**
 * Signatures for an ordered list of documents, stored row-major in a single
 * pre-sized buffer. Row i belongs to documentIds[i].
 */
export class SignatureMatrix {
  readonly numDocs: number;
  readonly numHashes: number;
  readonly documentIds: readonly number[];
  private readonly values: Float64Array;

  constructor(documentIds: readonly number[], numHashes: number, fill: number) {
    this.documentIds = Object.freeze([...documentIds]);
    this.numDocs = documentIds.length;
    this.numHashes = numHashes;
    this.values = new Float64Array(this.numDocs * numHashes).fill(fill);
  }

  /**
   * View of one document's signature. It shares the matrix buffer: callers
   * must not write to it. Use rows() for copies.
   */
  row(index: number): Signature {
    if (!Number.isInteger(index) || index < 0 || index >= this.numDocs) {
      throw new RangeError(`Signature row ${index} out of range (0..${this.numDocs - 1})`);
    }
    const start = index * this.numHashes;
    return this.values.subarray(start, start + this.numHashes);
  }

  /**
   * Copies of every row, safe to modify
   */
  rows(): Signature[] {
    return Array.from({ length: this.numDocs }, (_, i) => this.row(i).slice());
  }
}

export function sentinelFor(family: HashFunctionFamily): number {
  return family.prime + 1;
}

export class MinHashSignatureGenerator {
  private readonly family: HashFunctionFamily;
  private readonly sentinel: number;

  constructor(family: HashFunctionFamily) {
    if (family.a.length !== family.size || family.b.length !== family.size || family.size <= 0) {
      throw new ConfigurationError('Hash family pools must both hold numHashes coefficients', {
        size: family.size,
        a: family.a.length,
        b: family.b.length,
      });
    }
    this.family = family;
    this.sentinel = sentinelFor(family);
  }

  get numHashes(): number {
    return this.family.size;
  }

  /**
   * Generate the MinHash signature for one shingle set
   */
  signature(shingles: ShingleSet): Signature {
    const out = new Float64Array(this.family.size).fill(this.sentinel);
    this.fill(out, shingles);
    return out;
  }

  /**
   * Generate signatures for every document, preserving the given order.
   * The signal is checked once per document.
   */
  signatures(
    documents: readonly DocumentShingles[],
    options: CancellableOptions = {}
  ): SignatureMatrix {
    const matrix = new SignatureMatrix(
      documents.map(doc => doc.id),
      this.family.size,
      this.sentinel
    );

    documents.forEach((doc, index) => {
      throwIfCancelled(options.signal, 'signature generation', { documentId: doc.id });
      this.fill(matrix.row(index), doc.shingles);
    });

    return matrix;
  }

  private fill(out: Signature, shingles: ShingleSet): void {
    const { a, b, prime, size } = this.family;
    const values = Array.from(shingles);

    for (let i = 0; i < size; i++) {
      let minHash = out[i];
      for (const shingle of values) {
        const hashCode = mulAddMod(a[i], shingle, b[i], prime);
        if (hashCode < minHash) {
          minHash = hashCode;
        }
      }
      out[i] = minHash;
    }
  }
}

/**
 * True when no shingle lowered any slot (the document had no shingles)
 */
export function isEmptySignature(signature: Signature, family: HashFunctionFamily): boolean {
  const sentinel = sentinelFor(family);
  return signature.every(value => value === sentinel);
}
