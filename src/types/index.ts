import type { AttachmentVersionsEnum } from "@/enums/attachment/attachment-versions.enum";
import type { RestoreLayoutEnum } from "@/enums/attachment/restore-layout.enum";
import type { ExportDocument } from "./document";
import type { RecordId } from "./record";

export type * from "./record";
export type * from "./document";

// Attachment restoration
export interface AttachmentOptions {
  sourceDir: string;
  restoreDir?: string;
  layout: RestoreLayoutEnum;
  versions: AttachmentVersionsEnum;
}

export interface CopyInstruction {
  attachmentId: RecordId;
  sourcePath: string;
  destinationPath: string;
}

export interface CopyReport {
  copied: number;
  failed: number;
  // per-file detail, diagnostic only
  failedIds: RecordId[];
}

// Executes copy instructions handed back by the attachment resolver
export interface AttachmentCopier {
  copy(instructions: CopyInstruction[]): CopyReport;
}

export interface ConversionOptions {
  attachments?: AttachmentOptions;
}

export interface ConversionOutput {
  document: ExportDocument;
  copyInstructions: CopyInstruction[];
}

// Error Types
export interface ApiError {
  success: false;
  error: string;
  code?: string;
  details?: Record<string, unknown>;
}

export interface StructuralError extends ApiError {
  code: "STRUCTURAL_ERROR";
  details: {
    line?: number;
    column?: number;
    message: string;
  };
}

export interface InputError extends ApiError {
  code: "INPUT_ERROR";
  details: {
    path: string;
    message: string;
  };
}

export interface OutputError extends ApiError {
  code: "OUTPUT_ERROR";
  details: {
    path: string;
    message: string;
  };
}

export type SpecificError = StructuralError | InputError | OutputError;

export type ConversionResult =
  | { success: true; data: ConversionOutput }
  | StructuralError;
