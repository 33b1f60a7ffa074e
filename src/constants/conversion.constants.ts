import { AttachmentVersionsEnum } from "@/enums/attachment/attachment-versions.enum";
import { RestoreLayoutEnum } from "@/enums/attachment/restore-layout.enum";

/**
 * Defaults for a conversion run, each overridable from the environment
 */
export const CONVERSION_DEFAULTS = {
  OUTPUT_FILE: "confluence_data.json",
  ATTACHMENT_VERSIONS: AttachmentVersionsEnum.ALL,
  RESTORE_LAYOUT: RestoreLayoutEnum.NESTED,
  LOGGING_APP_NAME: "confluence-export-json",
  LOG_LEVEL: "info",
} as const;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

// Fixed date-time representation used by the export: 2021-03-18 14:21:51.000
export const EXPORT_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,3}))?$/;

// Only the first bytes are inspected for an encoding declaration
export const PROLOGUE_SCAN_BYTES = 256;
