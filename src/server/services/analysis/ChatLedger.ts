import type { QuestionAnswerRecord } from './types.js';

function copyRecord(record: QuestionAnswerRecord): QuestionAnswerRecord {
  return { ...record, relevant_sections: [...record.relevant_sections] };
}

/**
 * Append-only question/answer history shared by the whole process.
 *
 * Records are copied on the way in and on the way out, so an appended entry
 * cannot be changed afterwards.
 */
export class ChatLedger {
  private entries: QuestionAnswerRecord[] = [];

  append(record: QuestionAnswerRecord): void {
    this.entries.push(copyRecord(record));
  }

  /**
   * Oldest first
   */
  readAll(): QuestionAnswerRecord[] {
    return this.entries.map(copyRecord);
  }

  clear(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }
}
