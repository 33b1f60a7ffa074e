import type { RecordId } from "./record";

export type JsonScalar = string | number | boolean | null;
export type JsonValue = JsonScalar | JsonValue[] | { [key: string]: JsonValue };

// Containers of content are a closed set, anything else is "unknown"
export type ContainerKind = "page" | "blog_post" | "custom_content" | "unknown";
// Content properties may also hang off an attachment
export type OwnerKind = ContainerKind | "attachment";

export interface ContentRef<K extends OwnerKind = ContainerKind> {
  kind: K;
  id: RecordId;
}

export interface PageEntity {
  id: RecordId;
  title: string;
  body: string;
  body_storage: string | null;
  space_key: string | null;
  version: number | null;
  status: string | null;
  created_at: string | null;
  modified_at: string | null;
  parent_id: RecordId | null;
  author_id: RecordId | null;
  last_modifier_id: RecordId | null;
  original_version_id: RecordId | null;
  label_ids: RecordId[];
  content_property_ids: RecordId[];
  attachment_ids: RecordId[];
}

export interface BlogPostEntity {
  id: RecordId;
  title: string;
  body: string;
  body_storage: string | null;
  space_key: string | null;
  version: number | null;
  status: string | null;
  posted_at: string | null;
  modified_at: string | null;
  author_id: RecordId | null;
  last_modifier_id: RecordId | null;
  original_version_id: RecordId | null;
  label_ids: RecordId[];
  content_property_ids: RecordId[];
  attachment_ids: RecordId[];
}

export interface CustomContentEntity {
  id: RecordId;
  type: string | null;
  title: string;
  body: string;
  body_storage: string | null;
  status: string | null;
  created_at: string | null;
  modified_at: string | null;
  container: ContentRef | null;
  author_id: RecordId | null;
  content_property_ids: RecordId[];
}

export interface AttachmentEntity {
  id: RecordId;
  filename: string;
  media_type: string | null;
  version: number | null;
  file_size: number | null;
  status: string | null;
  created_at: string | null;
  container: ContentRef | null;
  author_id: RecordId | null;
  original_version_id: RecordId | null;
  content_property_ids: RecordId[];
  // set only when the attachment was restored
  restored_path: string | null;
}

export interface UserEntity {
  id: RecordId;
  username: string | null;
  display_name: string | null;
  email: string | null;
}

export interface LabelEntity {
  id: RecordId;
  name: string;
  namespace: string | null;
}

export interface ContentPropertyEntity {
  id: RecordId;
  name: string;
  value: JsonValue;
  owner: ContentRef<OwnerKind> | null;
}

export interface OtherEntity {
  id: RecordId;
  type: string;
  properties: Record<string, JsonScalar>;
}

export type ProjectedEntity =
  | { kind: "page"; entity: PageEntity }
  | { kind: "blog_post"; entity: BlogPostEntity }
  | { kind: "custom_content"; entity: CustomContentEntity }
  | { kind: "attachment"; entity: AttachmentEntity }
  | { kind: "user"; entity: UserEntity }
  | { kind: "label"; entity: LabelEntity }
  | { kind: "content_property"; entity: ContentPropertyEntity }
  | { kind: "other"; entity: OtherEntity };

export type EntityKind = ProjectedEntity["kind"];

export interface AttachmentSummary {
  requested: number;
  resolved: number;
  unresolved: number;
  not_requested: number;
  restored: number;
  copy_failed: number;
}

export interface DocumentSummary {
  records_parsed: number;
  records_skipped: number;
  duplicate_ids: number;
  unresolved_references: number;
  folded_records: number;
  entities: {
    pages: number;
    blog_posts: number;
    custom_contents: number;
    users: number;
    labels: number;
    content_properties: number;
    attachments: number;
    others: number;
  };
  attachments: AttachmentSummary;
}

export interface ExportDocument {
  pages: PageEntity[];
  blog_posts: BlogPostEntity[];
  custom_contents: CustomContentEntity[];
  users: UserEntity[];
  labels: LabelEntity[];
  content_properties: ContentPropertyEntity[];
  attachments: AttachmentEntity[];
  others: OtherEntity[];
  summary: DocumentSummary;
}

// Parse/projection counters handed to the assembler
export interface ConversionStats {
  recordsParsed: number;
  recordsSkipped: number;
  duplicateIds: number;
  unresolvedReferences: number;
  foldedRecords: number;
  attachments: AttachmentSummary;
}
