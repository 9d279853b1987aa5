/**
 * In-memory EvidenceSource. Stands in for the knowledge-graph store in
 * tests and offline runs; records are validated on the way in and frozen.
 */

import { z } from "zod";
import type { EvidenceRecord, EvidenceSource } from "@/types/evidence";

export const EvidenceRecordSchema = z.object({
  subject: z.string().min(1),
  predicate: z.string().min(1),
  object: z.string().min(1),
  confidence: z.number().min(0).max(1),
  uncertainty: z.number().min(0).max(1),
  sources: z.array(z.string().min(1)).default([]),
});

const EvidenceListSchema = z.array(EvidenceRecordSchema);

export class InMemoryEvidenceStore implements EvidenceSource {
  private readonly bySubject = new Map<string, EvidenceRecord[]>();

  constructor(records: readonly EvidenceRecord[] = []) {
    for (const record of records) {
      const frozen: EvidenceRecord = Object.freeze({ ...record, sources: [...record.sources] });
      const key = record.subject.toUpperCase();
      const list = this.bySubject.get(key) ?? [];
      list.push(frozen);
      this.bySubject.set(key, list);
    }
  }

  /** Build a store from untrusted JSON (e.g. a graph export). Throws ZodError on bad records. */
  static fromJson(data: unknown): InMemoryEvidenceStore {
    return new InMemoryEvidenceStore(EvidenceListSchema.parse(data));
  }

  /** Subject matching is case-insensitive; predicate matching is exact. */
  findEvidence(subject: string, predicate?: string): readonly EvidenceRecord[] {
    const list = this.bySubject.get(subject.toUpperCase()) ?? [];
    return predicate === undefined ? list : list.filter((r) => r.predicate === predicate);
  }
}

export const EMPTY_EVIDENCE: EvidenceSource = new InMemoryEvidenceStore();
