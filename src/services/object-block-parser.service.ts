/**
 * Decodes the generic object graph of an export (entities.xml) into GenericRecords.
 *
 * The export does not use typed elements. Every source object is an <object class="...">
 * block made of:
 *   <id name="id">123</id>                                   identifier (users use name="key")
 *   <property name="title">Home</property>                   scalar
 *   <property name="space" class="Space"><id ...>7</id></property>   reference
 *   <collection name="labellings"><element class="Labelling"><id ...>9</id></element></collection>
 *
 * Older exports nest relation objects instead, with <ref name="label"><id>5</id></ref> inside
 * them, and wrap single references in a collection (<collection name="parent"><ref>...).
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { StructuralParseError } from "@/utils/error-handler.util";
import { coerceScalar } from "@/utils/scalar.util";
import type {
  BlockParseResult,
  CollectionItem,
  GenericRecord,
  IdentifiedRecord,
  Reference,
} from "@/types";

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";
const OBJECT_TAG = "object";

interface XmlElement {
  tag: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

// Text content is kept as a plain string
type XmlNode = XmlElement | string;

class MalformedBlockError extends Error {
  constructor(
    message: string,
    readonly className?: string,
  ) {
    super(message);
    this.name = "MalformedBlockError";
  }
}

export class ObjectBlockParser {
  /**
   * Throws StructuralParseError when the document is not well-formed
   */
  static validate(xml: string): void {
    const result = XMLValidator.validate(xml);
    if (result !== true) {
      throw new StructuralParseError(result.err.msg, result.err.line, result.err.col);
    }
  }

  /**
   * Lazily yields every top-level object block in document order. Each call starts over
   * from the beginning. A block that cannot be decoded is yielded as an issue and the
   * sequence continues.
   */
  static *parse(xml: string): Generator<BlockParseResult, void, undefined> {
    ObjectBlockParser.validate(xml);

    let parsed: unknown;
    try {
      parsed = new XMLParser({
        preserveOrder: true,
        ignoreAttributes: false,
        attributeNamePrefix: "",
        parseTagValue: false,
        parseAttributeValue: false,
        trimValues: true,
        processEntities: true,
        // numeric character references are only decoded with this on
        htmlEntities: true,
        ignoreDeclaration: true,
        ignorePiTags: true,
      }).parse(xml);
    } catch (error: unknown) {
      throw new StructuralParseError(error instanceof Error ? error.message : String(error));
    }

    const root = findRootEntries(parsed);
    if (!root) {
      throw new StructuralParseError("Document has no root element");
    }

    let index = 0;
    for (const entry of root) {
      if (!isObject(entry) || !(OBJECT_TAG in entry)) continue;

      const position = index++;
      const element = toElement(OBJECT_TAG, entry);
      try {
        const record = decodeObject(element, true);
        if (record.id === undefined) {
          throw new MalformedBlockError("Object block has no identifier", record.className);
        }
        const identified: IdentifiedRecord = { ...record, id: record.id };
        yield { ok: true, index: position, record: identified };
      } catch (error: unknown) {
        if (!(error instanceof MalformedBlockError)) throw error;
        yield {
          ok: false,
          issue: {
            index: position,
            className: error.className ?? element.attributes.class,
            reason: error.message,
          },
        };
      }
    }
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function findRootEntries(parsed: unknown): unknown[] | undefined {
  if (!Array.isArray(parsed)) return undefined;
  for (const entry of parsed) {
    if (!isObject(entry)) continue;
    for (const [key, content] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue;
      return Array.isArray(content) ? content : [];
    }
  }
  return undefined;
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isObject(value)) return attributes;
  for (const [key, attribute] of Object.entries(value)) {
    attributes[key] = String(attribute);
  }
  return attributes;
}

function toNodes(value: unknown): XmlNode[] {
  if (!Array.isArray(value)) return [];
  const nodes: XmlNode[] = [];
  for (const entry of value) {
    if (!isObject(entry)) continue;
    for (const [key, content] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        if (content !== undefined && content !== null) nodes.push(String(content));
        continue;
      }
      nodes.push(toElement(key, entry));
    }
  }
  return nodes;
}

function toElement(tag: string, entry: Record<string, unknown>): XmlElement {
  return {
    tag,
    attributes: toAttributes(entry[ATTRIBUTES_KEY]),
    children: toNodes(entry[tag]),
  };
}

function childElements(element: XmlElement, tag?: string): XmlElement[] {
  return element.children.filter(
    (child): child is XmlElement => typeof child !== "string" && (tag === undefined || child.tag === tag),
  );
}

// CDATA sections may be split into several text nodes
function textOf(element: XmlElement): string | null {
  const parts = element.children.filter((child): child is string => typeof child === "string");
  return parts.length > 0 ? parts.join("") : null;
}

function referenceOf(element: XmlElement): Reference | null | undefined {
  const [idElement] = childElements(element, "id");
  if (!idElement) return undefined;
  const id = textOf(idElement)?.trim();
  if (!id) return null;
  const reference: Reference = { kind: "reference", id };
  if (element.attributes.class) reference.className = element.attributes.class;
  return reference;
}

function scalarTag(element: XmlElement): string | undefined {
  return element.attributes.type ?? (element.attributes["enum-class"] ? "string" : undefined);
}

function decodeObject(element: XmlElement, isTopLevel: boolean): GenericRecord {
  const className = element.attributes.class;
  if (!className) {
    throw new MalformedBlockError(
      isTopLevel ? "Object block has no class attribute" : "Embedded object has no class attribute",
    );
  }

  const record: GenericRecord = {
    className,
    scalars: new Map(),
    references: new Map(),
    collections: new Map(),
  };
  if (element.attributes.package) record.packageName = element.attributes.package;

  for (const child of childElements(element)) {
    switch (child.tag) {
      case "id": {
        if (record.id !== undefined) {
          throw new MalformedBlockError("Object block has more than one identifier", className);
        }
        const id = textOf(child)?.trim();
        if (!id) {
          throw new MalformedBlockError("Object block has an empty identifier", className);
        }
        record.id = id;
        if (child.attributes.name) record.idName = child.attributes.name;
        break;
      }
      case "property":
      case "ref":
        decodeProperty(record, child);
        break;
      case "collection":
        decodeCollection(record, child);
        break;
      default:
        // other tags carry nothing the projection reads
        break;
    }
  }

  return record;
}

function decodeProperty(record: GenericRecord, element: XmlElement): void {
  const name = element.attributes.name;
  if (!name) {
    throw new MalformedBlockError("Property has no name attribute", record.className);
  }

  const reference = referenceOf(element);
  if (reference !== undefined) {
    if (reference === null) {
      // reference without identifier degrades to null
      record.scalars.set(name, null);
    } else {
      record.references.set(name, reference);
    }
    return;
  }

  const [embedded] = childElements(element, OBJECT_TAG);
  if (embedded) {
    record.collections.set(name, [{ kind: "record", record: decodeObject(embedded, false) }]);
    return;
  }

  record.scalars.set(name, coerceScalar(textOf(element), scalarTag(element)));
}

function decodeCollection(record: GenericRecord, element: XmlElement): void {
  const name = element.attributes.name;
  if (!name) {
    throw new MalformedBlockError("Collection has no name attribute", record.className);
  }

  const items: CollectionItem[] = [];
  for (const child of childElements(element)) {
    if (child.tag === OBJECT_TAG) {
      items.push({ kind: "record", record: decodeObject(child, false) });
      continue;
    }
    if (child.tag !== "element" && child.tag !== "ref") continue;

    const reference = referenceOf(child);
    if (reference) {
      items.push(reference);
      continue;
    }
    if (reference === null) continue;

    const [embedded] = childElements(child, OBJECT_TAG);
    if (embedded) {
      items.push({ kind: "record", record: decodeObject(embedded, false) });
      continue;
    }
    items.push({ kind: "scalar", value: coerceScalar(textOf(child), scalarTag(child)) });
  }
  record.collections.set(name, items);
}
