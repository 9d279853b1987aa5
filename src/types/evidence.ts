/** Graph-owned provenance consumed read-only by the simulation core. */

export interface EvidenceRecord {
  subject: string;
  predicate: string;
  object: string;
  /** 0–1 */
  confidence: number;
  /** 0–1, estimated independently of confidence */
  uncertainty: number;
  /** Citation identifiers (PMID:…, DOI:…, dataset ids) */
  sources: string[];
}

/** Read-only query surface of the knowledge-graph store. */
export interface EvidenceSource {
  findEvidence(subject: string, predicate?: string): readonly EvidenceRecord[];
}
