// Generic object-graph types produced by the object block parser

// Exact text of an <id> element. Content ids are numeric, user keys are hex strings.
export type RecordId = string;

export type ScalarValue = string | number | boolean | Date | null;

export interface Reference {
  kind: "reference";
  id: RecordId;
  // class hint carried by the referencing element, if any
  className?: string;
}

export interface EmbeddedRecord {
  kind: "record";
  record: GenericRecord;
}

export type CollectionItem = Reference | { kind: "scalar"; value: ScalarValue } | EmbeddedRecord;

export interface GenericRecord {
  className: string;
  packageName?: string;
  // absent for anonymous objects embedded in a collection
  id?: RecordId;
  idName?: string;
  scalars: Map<string, ScalarValue>;
  references: Map<string, Reference>;
  collections: Map<string, CollectionItem[]>;
}

export interface IdentifiedRecord extends GenericRecord {
  id: RecordId;
}

export interface MalformedBlock {
  // zero-based position of the block among the top-level objects
  index: number;
  className?: string;
  reason: string;
}

export type BlockParseResult =
  | { ok: true; index: number; record: IdentifiedRecord }
  | { ok: false; issue: MalformedBlock };
