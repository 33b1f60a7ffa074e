import fs from "fs";
import path from "path";
import { uniq as _uniq } from "lodash";
import { AttachmentVersionsEnum } from "@/enums/attachment/attachment-versions.enum";
import { RestoreLayoutEnum } from "@/enums/attachment/restore-layout.enum";
import { errorMessage } from "@/utils/error-handler.util";
import { sanitizeFilename } from "@/utils/helper.util";
import { Logger } from "@/utils/logger.util";
import type { AttachmentEntity, AttachmentOptions, CopyInstruction, RecordId } from "@/types";

export interface AttachmentResolverOptions extends AttachmentOptions {
  // existence check for a regular file, replaceable in tests
  isFile?: (filePath: string) => boolean;
}

export interface AttachmentResolution {
  // source file per requested attachment, null when none was found
  sources: Map<RecordId, string | null>;
  // destination per resolved attachment, only when a restore directory was given
  destinations: Map<RecordId, string>;
  copyInstructions: CopyInstruction[];
  requested: number;
  resolved: number;
  unresolved: number;
  notRequested: number;
}

/**
 * Finds the file of each attachment version in an export's attachments directory.
 *
 * Exports store versions as <container id>/<attachment id>/<version>, where the attachment
 * id is the one of the current version. Older exports deviate, so a few fallbacks are tried.
 * Nothing is copied here: copy instructions are handed back to the caller.
 */
export class AttachmentResolver {
  private logger: Logger;
  private options: AttachmentResolverOptions;
  private isFile: (filePath: string) => boolean;

  constructor(options: AttachmentResolverOptions) {
    this.logger = new Logger({ context: "AttachmentResolver" });
    this.options = options;
    this.isFile = options.isFile ?? ((filePath) => this.isRegularFile(filePath));
  }

  resolve(attachments: AttachmentEntity[]): AttachmentResolution {
    const resolution: AttachmentResolution = {
      sources: new Map(),
      destinations: new Map(),
      copyInstructions: [],
      requested: 0,
      resolved: 0,
      unresolved: 0,
      notRequested: 0,
    };

    for (const attachment of attachments) {
      if (!this.isRequested(attachment)) {
        resolution.notRequested++;
        continue;
      }
      resolution.requested++;

      const candidates = this.candidatePaths(attachment);
      const sourcePath = candidates.find((candidate) => this.isFile(candidate)) ?? null;
      resolution.sources.set(attachment.id, sourcePath);

      if (!sourcePath) {
        resolution.unresolved++;
        this.logger.debug("Attachment source not found", {
          attachmentId: attachment.id,
          filename: attachment.filename,
          candidates,
        });
        continue;
      }
      resolution.resolved++;

      if (this.options.restoreDir) {
        const destinationPath = this.destinationPath(attachment, this.options.restoreDir);
        resolution.destinations.set(attachment.id, destinationPath);
        resolution.copyInstructions.push({
          attachmentId: attachment.id,
          sourcePath,
          destinationPath,
        });
      }
    }

    this.logger.info("Resolved attachment sources", {
      requested: resolution.requested,
      resolved: resolution.resolved,
      unresolved: resolution.unresolved,
      notRequested: resolution.notRequested,
    });

    return resolution;
  }

  isRequested(attachment: AttachmentEntity): boolean {
    return (
      this.options.versions === AttachmentVersionsEnum.ALL ||
      attachment.original_version_id === null
    );
  }

  candidatePaths(attachment: AttachmentEntity): string[] {
    const { sourceDir } = this.options;
    const currentId = attachment.original_version_id ?? attachment.id;
    const version = String(attachment.version ?? 1);
    const containerId = attachment.container?.id;

    const candidates: string[] = [];
    if (containerId) {
      candidates.push(path.join(sourceDir, containerId, currentId, version));
      candidates.push(path.join(sourceDir, containerId, attachment.id, version));
      candidates.push(path.join(sourceDir, containerId, currentId));
    }
    candidates.push(path.join(sourceDir, currentId, version));
    return _uniq(candidates);
  }

  destinationPath(attachment: AttachmentEntity, restoreDir: string): string {
    const filename = sanitizeFilename(attachment.filename, `attachment-${attachment.id}`);
    if (this.options.layout === RestoreLayoutEnum.FLAT) {
      return path.join(restoreDir, `${attachment.id}_${filename}`);
    }
    const containerId = attachment.container?.id;
    return containerId
      ? path.join(restoreDir, containerId, attachment.id, filename)
      : path.join(restoreDir, attachment.id, filename);
  }

  private isRegularFile(filePath: string): boolean {
    try {
      return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
    } catch (error: unknown) {
      this.logger.debug("Cannot inspect attachment candidate", {
        filePath,
        error: errorMessage(error),
      });
      return false;
    }
  }
}

export function resolveAttachments(
  attachments: AttachmentEntity[],
  options: AttachmentResolverOptions,
): AttachmentResolution {
  return new AttachmentResolver(options).resolve(attachments);
}
