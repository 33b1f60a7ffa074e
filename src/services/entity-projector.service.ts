import { uniq as _uniq } from "lodash";
import { RecordClassEnum } from "@/enums/record/record-class.enum";
import { Logger } from "@/utils/logger.util";
import { compareRecordIds } from "@/utils/helper.util";
import { stripMarkup } from "@/utils/markup.util";
import {
  decodeStructuredValue,
  scalarToInteger,
  scalarToJson,
  scalarToString,
  scalarToTimestamp,
} from "@/utils/scalar.util";
import type {
  AttachmentEntity,
  BlogPostEntity,
  ContainerKind,
  ContentPropertyEntity,
  ContentRef,
  CustomContentEntity,
  EmbeddedRecord,
  EntityKind,
  GenericRecord,
  IdentifiedRecord,
  JsonScalar,
  JsonValue,
  LabelEntity,
  OtherEntity,
  OwnerKind,
  PageEntity,
  ProjectedEntity,
  RecordId,
  Reference,
  ScalarValue,
  UserEntity,
} from "@/types";
import type { ReferenceTable } from "./reference-table.service";

const ENTITY_KIND_ORDER: EntityKind[] = [
  "page",
  "blog_post",
  "custom_content",
  "attachment",
  "user",
  "label",
  "content_property",
  "other",
];

const ENTITY_KIND_BY_CLASS: ReadonlyMap<string, EntityKind> = new Map<string, EntityKind>([
  [RecordClassEnum.PAGE, "page"],
  [RecordClassEnum.BLOG_POST, "blog_post"],
  ["Blogpost", "blog_post"],
  [RecordClassEnum.CUSTOM_CONTENT, "custom_content"],
  [RecordClassEnum.ATTACHMENT, "attachment"],
  [RecordClassEnum.USER, "user"],
  [RecordClassEnum.LABEL, "label"],
  [RecordClassEnum.CONTENT_PROPERTY, "content_property"],
]);

// Relation records whose content is folded into the entities that own them
const FOLDED_CLASSES: ReadonlySet<string> = new Set<string>([
  RecordClassEnum.BODY_CONTENT,
  RecordClassEnum.LABELLING,
  RecordClassEnum.INTERNAL_USER,
]);

const CONTAINER_KIND_BY_CLASS: ReadonlyMap<string, ContainerKind> = new Map<string, ContainerKind>([
  [RecordClassEnum.PAGE, "page"],
  [RecordClassEnum.BLOG_POST, "blog_post"],
  ["Blogpost", "blog_post"],
  [RecordClassEnum.CUSTOM_CONTENT, "custom_content"],
]);

const OWNER_KIND_BY_CLASS: ReadonlyMap<string, OwnerKind> = new Map<string, OwnerKind>([
  ...CONTAINER_KIND_BY_CLASS,
  [RecordClassEnum.ATTACHMENT, "attachment"],
]);

// Names under which an owned record points back at its content, by export generation
const OWNER_REFERENCE_NAMES = ["containerContent", "content", "container", "page", "blogPost"];

const ATTACHMENT_SIZE_PROPERTY = "FILESIZE";
const ATTACHMENT_MEDIA_TYPE_PROPERTY = "MEDIA_TYPE";

/**
 * Maps the generic records of a reference table onto output entities.
 *
 * Relations are written as ids of the related entity, never as nested projections, so each
 * record is projected once (memoised by id) and identically no matter who points at it.
 */
export class EntityProjector {
  private logger: Logger;
  private memo: Map<RecordId, ProjectedEntity | null> = new Map();
  private unresolved = 0;
  private folded = 0;

  private bodiesByOwner: Map<RecordId, RecordId[]> = new Map();
  private labellingsByOwner: Map<RecordId, RecordId[]> = new Map();
  private propertiesByOwner: Map<RecordId, RecordId[]> = new Map();
  private attachmentsByOwner: Map<RecordId, RecordId[]> = new Map();
  private internalUsersByName: Map<string, IdentifiedRecord> = new Map();

  constructor(private readonly table: ReferenceTable) {
    this.logger = new Logger({ context: "EntityProjector" });
    this.buildReverseIndexes();
  }

  /**
   * Entities grouped by kind, then by ascending source id
   */
  project(): ProjectedEntity[] {
    const entities: ProjectedEntity[] = [];
    for (const record of this.table.records()) {
      const entity = this.projectRecord(record);
      if (entity) entities.push(entity);
    }
    return sortEntities(entities);
  }

  projectRecord(record: IdentifiedRecord): ProjectedEntity | null {
    const memoised = this.memo.get(record.id);
    if (memoised !== undefined) return memoised;

    const entity = this.buildEntity(record);
    if (!entity) this.folded++;
    this.memo.set(record.id, entity);
    return entity;
  }

  get unresolvedReferenceCount(): number {
    return this.unresolved;
  }

  get foldedRecordCount(): number {
    return this.folded;
  }

  private buildEntity(record: IdentifiedRecord): ProjectedEntity | null {
    if (FOLDED_CLASSES.has(record.className)) return null;

    switch (ENTITY_KIND_BY_CLASS.get(record.className)) {
      case "page":
        return { kind: "page", entity: this.projectPage(record) };
      case "blog_post":
        return { kind: "blog_post", entity: this.projectBlogPost(record) };
      case "custom_content":
        return { kind: "custom_content", entity: this.projectCustomContent(record) };
      case "attachment":
        return { kind: "attachment", entity: this.projectAttachment(record) };
      case "user":
        return { kind: "user", entity: this.projectUser(record) };
      case "label":
        return { kind: "label", entity: this.projectLabel(record) };
      case "content_property":
        return { kind: "content_property", entity: this.projectContentProperty(record) };
      default:
        return { kind: "other", entity: projectOther(record) };
    }
  }

  private projectPage(record: IdentifiedRecord): PageEntity {
    const bodyStorage = this.bodyOf(record);
    const parent = this.parentOf(record);
    return {
      id: record.id,
      title: stringOf(record, "title") ?? "",
      body: stripMarkup(bodyStorage),
      body_storage: bodyStorage,
      space_key: this.spaceKeyOf(record),
      version: scalarToInteger(record.scalars.get("version")),
      status: stringOf(record, "contentStatus"),
      created_at: scalarToTimestamp(record.scalars.get("creationDate")),
      modified_at: scalarToTimestamp(record.scalars.get("lastModificationDate")),
      parent_id: parent?.className === RecordClassEnum.PAGE ? parent.id : null,
      author_id: this.userIdOf(record, "creator"),
      last_modifier_id: this.userIdOf(record, "lastModifier"),
      original_version_id: this.resolveReference(record, "originalVersion")?.id ?? null,
      label_ids: this.labelIdsOf(record),
      content_property_ids: this.contentPropertyIdsOf(record),
      attachment_ids: this.attachmentIdsOf(record),
    };
  }

  private projectBlogPost(record: IdentifiedRecord): BlogPostEntity {
    const bodyStorage = this.bodyOf(record);
    return {
      id: record.id,
      title: stringOf(record, "title") ?? "",
      body: stripMarkup(bodyStorage),
      body_storage: bodyStorage,
      space_key: this.spaceKeyOf(record),
      version: scalarToInteger(record.scalars.get("version")),
      status: stringOf(record, "contentStatus"),
      posted_at:
        scalarToTimestamp(record.scalars.get("postingDate")) ??
        scalarToTimestamp(record.scalars.get("creationDate")),
      modified_at: scalarToTimestamp(record.scalars.get("lastModificationDate")),
      author_id: this.userIdOf(record, "creator"),
      last_modifier_id: this.userIdOf(record, "lastModifier"),
      original_version_id: this.resolveReference(record, "originalVersion")?.id ?? null,
      label_ids: this.labelIdsOf(record),
      content_property_ids: this.contentPropertyIdsOf(record),
      attachment_ids: this.attachmentIdsOf(record),
    };
  }

  private projectCustomContent(record: IdentifiedRecord): CustomContentEntity {
    const bodyStorage = this.bodyOf(record);
    return {
      id: record.id,
      type: stringOf(record, "pluginModuleKey") ?? stringOf(record, "type"),
      title: stringOf(record, "title") ?? "",
      body: stripMarkup(bodyStorage),
      body_storage: bodyStorage,
      status: stringOf(record, "contentStatus"),
      created_at: scalarToTimestamp(record.scalars.get("creationDate")),
      modified_at: scalarToTimestamp(record.scalars.get("lastModificationDate")),
      container: this.contentRefOf(record, CONTAINER_KIND_BY_CLASS),
      author_id: this.userIdOf(record, "creator"),
      content_property_ids: this.contentPropertyIdsOf(record),
    };
  }

  private projectAttachment(record: IdentifiedRecord): AttachmentEntity {
    const propertyIds = this.contentPropertyIdsOf(record);
    const properties = this.propertyValuesOf(propertyIds);
    return {
      id: record.id,
      filename: stringOf(record, "title") ?? stringOf(record, "fileName") ?? "",
      media_type:
        stringOf(record, "mediaType") ??
        stringOf(record, "contentType") ??
        scalarToString(properties.get(ATTACHMENT_MEDIA_TYPE_PROPERTY)),
      version:
        scalarToInteger(record.scalars.get("version")) ??
        scalarToInteger(record.scalars.get("attachmentVersion")),
      file_size:
        scalarToInteger(record.scalars.get("fileSize")) ??
        scalarToInteger(properties.get(ATTACHMENT_SIZE_PROPERTY)),
      status: stringOf(record, "contentStatus"),
      created_at: scalarToTimestamp(record.scalars.get("creationDate")),
      container: this.contentRefOf(record, CONTAINER_KIND_BY_CLASS),
      author_id: this.userIdOf(record, "creator"),
      original_version_id: this.resolveReference(record, "originalVersion")?.id ?? null,
      content_property_ids: propertyIds,
      restored_path: null,
    };
  }

  private projectUser(record: IdentifiedRecord): UserEntity {
    const username = stringOf(record, "name");
    const lowerName = stringOf(record, "lowerName") ?? username?.toLowerCase();
    const internalUser = lowerName ? this.internalUsersByName.get(lowerName) : undefined;
    const internalDisplayName = internalUser
      ? stringOf(internalUser, "displayName") ?? fullNameOf(internalUser)
      : null;
    return {
      id: record.id,
      username,
      display_name:
        stringOf(record, "fullName") ??
        stringOf(record, "displayName") ??
        internalDisplayName ??
        username,
      email:
        stringOf(record, "email") ??
        (internalUser ? stringOf(internalUser, "emailAddress") ?? stringOf(internalUser, "email") : null),
    };
  }

  private projectLabel(record: IdentifiedRecord): LabelEntity {
    return {
      id: record.id,
      name: stringOf(record, "name") ?? "",
      namespace: stringOf(record, "namespace"),
    };
  }

  private projectContentProperty(record: IdentifiedRecord): ContentPropertyEntity {
    return {
      id: record.id,
      name: stringOf(record, "name") ?? "",
      value: contentPropertyValue(record),
      owner: this.contentRefOf(record, OWNER_KIND_BY_CLASS),
    };
  }

  // Relations

  private resolveReference(record: GenericRecord, name: string): IdentifiedRecord | undefined {
    const reference = record.references.get(name);
    return reference ? this.resolveCounted(record, name, reference) : undefined;
  }

  private resolveCounted(
    record: GenericRecord,
    relation: string,
    reference: Reference | RecordId,
  ): IdentifiedRecord | undefined {
    const target = this.table.resolve(reference);
    if (!target) {
      this.unresolved++;
      this.logger.debug("Dangling reference", {
        id: record.id,
        className: record.className,
        relation,
        target: typeof reference === "string" ? reference : reference.id,
      });
    }
    return target;
  }

  private parentOf(record: IdentifiedRecord): IdentifiedRecord | undefined {
    const reference =
      record.references.get("parent") ??
      record.collections.get("parent")?.find((item): item is Reference => item.kind === "reference");
    return reference ? this.resolveCounted(record, "parent", reference) : undefined;
  }

  private userIdOf(record: IdentifiedRecord, name: string): RecordId | null {
    const user = this.resolveReference(record, name);
    return user?.className === RecordClassEnum.USER ? user.id : null;
  }

  private spaceKeyOf(record: IdentifiedRecord): string | null {
    const space = this.resolveReference(record, "space");
    return space ? stringOf(space, "key") : null;
  }

  private contentRefOf<K extends OwnerKind>(
    record: IdentifiedRecord,
    kinds: ReadonlyMap<string, K>,
  ): ContentRef<K | "unknown"> | null {
    for (const name of OWNER_REFERENCE_NAMES) {
      const reference = record.references.get(name);
      if (!reference) continue;
      const target = this.resolveCounted(record, name, reference);
      if (!target) return null;
      return { kind: kinds.get(target.className) ?? "unknown", id: target.id };
    }
    return null;
  }

  // Forward collection when the export carries one, otherwise the records pointing back here.
  // Forward items are references or relation objects embedded in the collection.
  private relatedRecords(
    record: IdentifiedRecord,
    collection: string,
    reverseIndex: Map<RecordId, RecordId[]>,
    className: string,
  ): GenericRecord[] {
    const forward = (record.collections.get(collection) ?? []).filter(
      (item): item is Reference | EmbeddedRecord => item.kind !== "scalar",
    );
    if (forward.length === 0) {
      return (reverseIndex.get(record.id) ?? []).flatMap((id) => this.table.resolve(id) ?? []);
    }

    const related: GenericRecord[] = [];
    for (const item of forward) {
      const target = item.kind === "record" ? item.record : this.resolveCounted(record, collection, item);
      if (target?.className === className) related.push(target);
    }
    return related;
  }

  private relatedIds(
    record: IdentifiedRecord,
    collection: string,
    reverseIndex: Map<RecordId, RecordId[]>,
    className: string,
  ): RecordId[] {
    return this.relatedRecords(record, collection, reverseIndex, className).flatMap((related) => related.id ?? []);
  }

  private bodyOf(record: IdentifiedRecord): string | null {
    for (const body of this.relatedRecords(record, "bodyContents", this.bodiesByOwner, RecordClassEnum.BODY_CONTENT)) {
      const text = stringOf(body, "body");
      if (text !== null) return text;
    }
    return null;
  }

  private labelIdsOf(record: IdentifiedRecord): RecordId[] {
    const labelIds: RecordId[] = [];
    for (const labelling of this.relatedRecords(record, "labellings", this.labellingsByOwner, RecordClassEnum.LABELLING)) {
      const label = this.resolveReference(labelling, "label");
      if (label?.className === RecordClassEnum.LABEL) labelIds.push(label.id);
    }
    return _uniq(labelIds).sort(compareRecordIds);
  }

  private contentPropertyIdsOf(record: IdentifiedRecord): RecordId[] {
    return this.relatedIds(record, "contentProperties", this.propertiesByOwner, RecordClassEnum.CONTENT_PROPERTY);
  }

  private attachmentIdsOf(record: IdentifiedRecord): RecordId[] {
    return this.relatedIds(record, "attachments", this.attachmentsByOwner, RecordClassEnum.ATTACHMENT);
  }

  private propertyValuesOf(propertyIds: RecordId[]): Map<string, ScalarValue> {
    const values = new Map<string, ScalarValue>();
    for (const id of propertyIds) {
      const property = this.table.resolve(id);
      const name = property ? stringOf(property, "name") : null;
      if (!property || name === null) continue;
      values.set(
        name,
        property.scalars.get("stringValue") ?? property.scalars.get("longValue") ?? null,
      );
    }
    return values;
  }

  private buildReverseIndexes(): void {
    const indexes = new Map<string, Map<RecordId, RecordId[]>>([
      [RecordClassEnum.BODY_CONTENT, this.bodiesByOwner],
      [RecordClassEnum.LABELLING, this.labellingsByOwner],
      [RecordClassEnum.CONTENT_PROPERTY, this.propertiesByOwner],
      [RecordClassEnum.ATTACHMENT, this.attachmentsByOwner],
    ]);

    for (const record of this.table.records()) {
      if (record.className === RecordClassEnum.INTERNAL_USER) {
        const lowerName = stringOf(record, "lowerName") ?? stringOf(record, "name")?.toLowerCase();
        const existing = lowerName ? this.internalUsersByName.get(lowerName) : undefined;
        // several directory entries may share a name; the lowest id wins
        if (lowerName && (!existing || compareRecordIds(record.id, existing.id) < 0)) {
          this.internalUsersByName.set(lowerName, record);
        }
        continue;
      }

      const index = indexes.get(record.className);
      if (!index) continue;
      // historical attachment versions are reached through their current version
      if (record.className === RecordClassEnum.ATTACHMENT && record.references.has("originalVersion")) continue;

      const ownerReference = OWNER_REFERENCE_NAMES.map((name) => record.references.get(name)).find(
        (reference) => reference !== undefined,
      );
      if (!ownerReference) continue;
      index.set(ownerReference.id, [...(index.get(ownerReference.id) ?? []), record.id]);
    }

    for (const index of indexes.values()) {
      for (const ids of index.values()) ids.sort(compareRecordIds);
    }
  }
}

function stringOf(record: GenericRecord, name: string): string | null {
  return scalarToString(record.scalars.get(name));
}

function fullNameOf(record: IdentifiedRecord): string | null {
  const parts = [stringOf(record, "firstName"), stringOf(record, "lastName")].filter(
    (part): part is string => !!part,
  );
  return parts.length > 0 ? parts.join(" ") : null;
}

function contentPropertyValue(record: IdentifiedRecord): JsonValue {
  const stringValue = record.scalars.get("stringValue");
  if (stringValue !== undefined && stringValue !== null) {
    return typeof stringValue === "string" ? decodeStructuredValue(stringValue) : scalarToJson(stringValue);
  }
  const longValue = record.scalars.get("longValue");
  if (longValue !== undefined && longValue !== null) {
    return scalarToInteger(longValue) ?? scalarToJson(longValue);
  }
  const dateValue = record.scalars.get("dateValue");
  if (dateValue !== undefined && dateValue !== null) {
    return scalarToTimestamp(dateValue) ?? scalarToJson(dateValue);
  }
  return null;
}

function projectOther(record: IdentifiedRecord): OtherEntity {
  const properties: Record<string, JsonScalar> = {};
  for (const [name, value] of record.scalars) {
    properties[name] = scalarToJson(value);
  }
  return { id: record.id, type: record.className, properties };
}

export function sortEntities(entities: ProjectedEntity[]): ProjectedEntity[] {
  const kindRank = new Map(ENTITY_KIND_ORDER.map((kind, rank) => [kind, rank]));
  return [...entities].sort(
    (a, b) =>
      (kindRank.get(a.kind) ?? 0) - (kindRank.get(b.kind) ?? 0) ||
      compareRecordIds(a.entity.id, b.entity.id),
  );
}
