import fs from "fs";
import path from "path";
import { PROLOGUE_SCAN_BYTES } from "@/constants/conversion.constants";
import { errorMessage } from "@/utils/error-handler.util";
import { Logger } from "@/utils/logger.util";
import type { AttachmentCopier, CopyInstruction, CopyReport, ExportDocument } from "@/types";

const ENCODING_DECLARATION = /^<\?xml[^>]*\sencoding\s*=\s*["']([A-Za-z0-9._-]+)["']/;

/**
 * Pick the encoding of an XML document: byte order mark first, then the prologue declaration
 */
export function detectEncoding(bytes: Uint8Array): string {
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return "utf-8";
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return "utf-16le";
  if (bytes[0] === 0xfe && bytes[1] === 0xff) return "utf-16be";

  const head = Buffer.from(bytes.subarray(0, PROLOGUE_SCAN_BYTES)).toString("latin1");
  return head.match(ENCODING_DECLARATION)?.[1].toLowerCase() ?? "utf-8";
}

/**
 * File-system side of a conversion run: reading the export, copying attachment files
 * and writing the resulting document.
 */
export class FileSystemClient implements AttachmentCopier {
  private logger: Logger;

  constructor() {
    this.logger = new Logger({ context: "FileSystemClient" });
  }

  readExportFile(filePath: string): string {
    const bytes = fs.readFileSync(filePath);
    const encoding = detectEncoding(bytes);
    try {
      return new TextDecoder(encoding).decode(bytes);
    } catch (error: unknown) {
      this.logger.warn("Unsupported declared encoding, reading as UTF-8", {
        encoding,
        error: errorMessage(error),
      });
      return new TextDecoder("utf-8").decode(bytes);
    }
  }

  copy(instructions: CopyInstruction[]): CopyReport {
    const report: CopyReport = { copied: 0, failed: 0, failedIds: [] };

    for (const { attachmentId, sourcePath, destinationPath } of instructions) {
      try {
        fs.mkdirSync(path.dirname(destinationPath), { recursive: true });
        fs.copyFileSync(sourcePath, destinationPath);
        const { atime, mtime } = fs.statSync(sourcePath);
        fs.utimesSync(destinationPath, atime, mtime);
        report.copied++;
        this.logger.debug("Restored attachment", { attachmentId, sourcePath, destinationPath });
      } catch (error: unknown) {
        report.failed++;
        report.failedIds.push(attachmentId);
        this.logger.error("Failed to restore attachment", {
          attachmentId,
          sourcePath,
          destinationPath,
          error: errorMessage(error),
        });
      }
    }

    this.logger.info("Attachment restore finished", {
      copied: report.copied,
      failed: report.failed,
    });
    return report;
  }

  writeJson(filePath: string, document: ExportDocument): void {
    fs.writeFileSync(filePath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
  }
}
