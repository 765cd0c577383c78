import { randomUUID } from 'crypto';
import { NotFoundError } from '../../types/errors.js';
import type { AnalysisConfig, DocumentAnalysis, DocumentRecord } from './types.js';

/**
 * In-memory store of analyzed documents for the lifetime of the process.
 *
 * Every method is synchronous, so each call completes without interleaving
 * with other requests on the event loop. Records are frozen on store.
 */
export class DocumentRegistry {
  private readonly records = new Map<string, DocumentRecord>();

  constructor(private readonly generateId: () => string = randomUUID) {}

  store(text: string, config: AnalysisConfig, analysis: DocumentAnalysis): string {
    let id = this.generateId();
    while (this.records.has(id)) {
      id = this.generateId();
    }

    const record: DocumentRecord = Object.freeze({
      id,
      text,
      config: Object.freeze({ ...config }),
      analysis: Object.freeze({
        ...analysis,
        key_points: Object.freeze([...analysis.key_points]),
        risks_and_concerns: Object.freeze([...analysis.risks_and_concerns]),
        recommendations: Object.freeze([...analysis.recommendations]),
      }),
      createdAt: new Date(),
    });
    this.records.set(id, record);
    return id;
  }

  /**
   * @throws NotFoundError when the id was never stored
   */
  get(id: string): DocumentRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError('Document', id);
    }
    return record;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get size(): number {
    return this.records.size;
  }
}
