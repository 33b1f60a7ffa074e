import { ErrorHandler, StructuralParseError } from "@/utils/error-handler.util";
import { Logger } from "@/utils/logger.util";
import type {
  AttachmentCopier,
  AttachmentSummary,
  ConversionOptions,
  ConversionResult,
  CopyInstruction,
  RecordId,
} from "@/types";
import { resolveAttachments } from "./attachment-resolver.service";
import { DocumentAssembler } from "./document-assembler.service";
import { EntityProjector } from "./entity-projector.service";
import { ObjectBlockParser } from "./object-block-parser.service";
import { ReferenceTable } from "./reference-table.service";

/**
 * Runs one conversion: parse everything, then resolve and project, then locate attachments,
 * then assemble. Each phase consumes the previous one completely.
 */
export class ConversionService {
  private logger: Logger;

  constructor(private readonly copier?: AttachmentCopier) {
    this.logger = new Logger({ context: "ConversionService" });
  }

  convert(xml: string, options: ConversionOptions = {}): ConversionResult {
    const table = new ReferenceTable();
    let recordsParsed = 0;
    let recordsSkipped = 0;

    try {
      for (const result of ObjectBlockParser.parse(xml)) {
        if (result.ok) {
          table.register(result.record);
          recordsParsed++;
          continue;
        }
        recordsSkipped++;
        this.logger.debug("Skipped malformed object block", result.issue);
      }
    } catch (error: unknown) {
      if (error instanceof StructuralParseError) {
        ErrorHandler.logError(error, "ConversionService.convert");
        return ErrorHandler.createStructuralError(error);
      }
      throw error;
    }

    this.logger.info("Parsed object blocks", {
      recordsParsed,
      recordsSkipped,
      duplicateIds: table.duplicateCount,
    });

    const projector = new EntityProjector(table);
    const entities = projector.project();

    const attachmentSummary: AttachmentSummary = {
      requested: 0,
      resolved: 0,
      unresolved: 0,
      not_requested: 0,
      restored: 0,
      copy_failed: 0,
    };
    const restoredPaths = new Map<RecordId, string>();
    let copyInstructions: CopyInstruction[] = [];

    if (options.attachments) {
      const attachments = entities.flatMap((item) => (item.kind === "attachment" ? [item.entity] : []));
      const resolution = resolveAttachments(attachments, options.attachments);
      attachmentSummary.requested = resolution.requested;
      attachmentSummary.resolved = resolution.resolved;
      attachmentSummary.unresolved = resolution.unresolved;
      attachmentSummary.not_requested = resolution.notRequested;
      copyInstructions = resolution.copyInstructions;
      for (const [id, destination] of resolution.destinations) {
        restoredPaths.set(id, destination);
      }

      if (this.copier && copyInstructions.length > 0) {
        const report = this.copier.copy(copyInstructions);
        for (const id of report.failedIds) {
          restoredPaths.delete(id);
        }
        attachmentSummary.copy_failed = report.failed;
      }
      attachmentSummary.restored = restoredPaths.size;
    }

    const document = new DocumentAssembler().assemble(entities, restoredPaths, {
      recordsParsed,
      recordsSkipped,
      duplicateIds: table.duplicateCount,
      unresolvedReferences: projector.unresolvedReferenceCount,
      foldedRecords: projector.foldedRecordCount,
      attachments: attachmentSummary,
    });

    this.logger.info("Assembled document", document.summary.entities);

    return { success: true, data: { document, copyInstructions } };
  }
}
