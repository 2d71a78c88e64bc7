/**
 * Shape fingerprint of an extracted result.
 *
 * Paths look like `$.items[].title:string`; `[]` stands for any array element.
 */
export interface ShapeFingerprint {
  algorithmVersion: string;
  /** Sorted union of typed paths */
  paths: string[];
  /** Paths present in every sampled array element, excluding null-typed ones */
  required: string[];
  /** sha256 over the sorted path list */
  digest: string;
}

export interface FingerprintComparison {
  matched: boolean;
  /** Jaccard similarity of the two path sets */
  score: number;
  missingRequired: string[];
  added: string[];
  removed: string[];
}
