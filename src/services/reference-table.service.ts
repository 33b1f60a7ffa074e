import { Logger } from "@/utils/logger.util";
import type { IdentifiedRecord, RecordId, Reference } from "@/types";

/**
 * Every identified record of one export, keyed by identifier.
 *
 * Filled in a single forward pass and only read afterwards: references may point at
 * records that appear later in the file, so nothing is resolved while registering.
 */
export class ReferenceTable {
  private logger: Logger;
  private byId: Map<RecordId, IdentifiedRecord> = new Map();
  private duplicates = 0;

  constructor() {
    this.logger = new Logger({ context: "ReferenceTable" });
  }

  /**
   * Returns false when the id was already taken. The later record replaces the earlier one.
   */
  register(record: IdentifiedRecord): boolean {
    const existing = this.byId.get(record.id);
    if (existing) {
      this.duplicates++;
      this.logger.warn("Duplicate identifier, keeping the later record", {
        id: record.id,
        previousClass: existing.className,
        className: record.className,
      });
      // re-insert so iteration order follows the surviving record
      this.byId.delete(record.id);
      this.byId.set(record.id, record);
      return false;
    }
    this.byId.set(record.id, record);
    return true;
  }

  resolve(reference: Reference | RecordId | undefined): IdentifiedRecord | undefined {
    if (reference === undefined) return undefined;
    return this.byId.get(typeof reference === "string" ? reference : reference.id);
  }

  records(): IdentifiedRecord[] {
    return [...this.byId.values()];
  }

  get size(): number {
    return this.byId.size;
  }

  get duplicateCount(): number {
    return this.duplicates;
  }
}
