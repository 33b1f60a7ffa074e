import { AttachmentVersionsEnum } from "@/enums/attachment/attachment-versions.enum";
import { RestoreLayoutEnum } from "@/enums/attachment/restore-layout.enum";
import { CONVERSION_DEFAULTS, LOG_LEVELS } from "@/constants/conversion.constants";

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ConversionConfig {
  outputFile: string;
  attachmentVersions: AttachmentVersionsEnum;
  restoreLayout: RestoreLayoutEnum;
  loggingAppName: string;
  logLevel: LogLevel;
}

export function parseEnumValue<T extends string>(
  allowed: Record<string, T>,
  value: string | undefined,
): T | undefined {
  return Object.values(allowed).find((candidate) => candidate === value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

export function checkEnvironmentVariables() {
  const enumeratedVars: Array<[string, (value: string) => boolean]> = [
    ["LOG_LEVEL", (value) => parseLogLevel(value) !== undefined],
    ["ATTACHMENT_VERSIONS", (value) => parseEnumValue(AttachmentVersionsEnum, value) !== undefined],
    ["RESTORE_LAYOUT", (value) => parseEnumValue(RestoreLayoutEnum, value) !== undefined],
  ];
  const invalidVars = enumeratedVars
    .filter(([varName, isValid]) => {
      const value = process.env[varName];
      return value !== undefined && value !== "" && !isValid(value);
    })
    .map(([varName]) => varName);

  if (invalidVars.length > 0) {
    throw new Error(
      `Invalid values for environment variables: ${invalidVars.join(", ")}`,
    );
  }
}

export function loadConversionConfig(
  env: NodeJS.ProcessEnv = process.env,
): ConversionConfig {
  return {
    outputFile: env.DEFAULT_OUTPUT_FILE || CONVERSION_DEFAULTS.OUTPUT_FILE,
    attachmentVersions:
      parseEnumValue(AttachmentVersionsEnum, env.ATTACHMENT_VERSIONS) ??
      CONVERSION_DEFAULTS.ATTACHMENT_VERSIONS,
    restoreLayout:
      parseEnumValue(RestoreLayoutEnum, env.RESTORE_LAYOUT) ??
      CONVERSION_DEFAULTS.RESTORE_LAYOUT,
    loggingAppName: env.LOGGING_APP_NAME || CONVERSION_DEFAULTS.LOGGING_APP_NAME,
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? CONVERSION_DEFAULTS.LOG_LEVEL,
  };
}
