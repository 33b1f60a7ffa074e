import { Logger } from "@/utils/logger.util";
import type {
  ConversionStats,
  DocumentSummary,
  ExportDocument,
  ProjectedEntity,
  RecordId,
} from "@/types";

/**
 * Folds projected entities into the output document sections.
 * Entities must already be in output order.
 */
export class DocumentAssembler {
  private logger: Logger;

  constructor() {
    this.logger = new Logger({ context: "DocumentAssembler" });
  }

  assemble(
    entities: ProjectedEntity[],
    attachmentPaths: Map<RecordId, string>,
    stats: ConversionStats,
  ): ExportDocument {
    const sections: Omit<ExportDocument, "summary"> = {
      pages: [],
      blog_posts: [],
      custom_contents: [],
      users: [],
      labels: [],
      content_properties: [],
      attachments: [],
      others: [],
    };

    for (const item of entities) {
      switch (item.kind) {
        case "page":
          sections.pages.push(item.entity);
          break;
        case "blog_post":
          sections.blog_posts.push(item.entity);
          break;
        case "custom_content":
          sections.custom_contents.push(item.entity);
          break;
        case "attachment":
          sections.attachments.push({
            ...item.entity,
            restored_path: attachmentPaths.get(item.entity.id) ?? null,
          });
          break;
        case "user":
          sections.users.push(item.entity);
          break;
        case "label":
          sections.labels.push(item.entity);
          break;
        case "content_property":
          sections.content_properties.push(item.entity);
          break;
        case "other":
          sections.others.push(item.entity);
          break;
      }
    }

    const attachmentIds = new Set(sections.attachments.map((attachment) => attachment.id));
    for (const id of attachmentPaths.keys()) {
      if (!attachmentIds.has(id)) {
        this.logger.warn("Restored path for an unknown attachment ignored", { attachmentId: id });
      }
    }

    const summary: DocumentSummary = {
      records_parsed: stats.recordsParsed,
      records_skipped: stats.recordsSkipped,
      duplicate_ids: stats.duplicateIds,
      unresolved_references: stats.unresolvedReferences,
      folded_records: stats.foldedRecords,
      entities: {
        pages: sections.pages.length,
        blog_posts: sections.blog_posts.length,
        custom_contents: sections.custom_contents.length,
        users: sections.users.length,
        labels: sections.labels.length,
        content_properties: sections.content_properties.length,
        attachments: sections.attachments.length,
        others: sections.others.length,
      },
      attachments: { ...stats.attachments },
    };

    return { ...sections, summary };
  }
}
