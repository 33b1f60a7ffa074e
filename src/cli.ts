import fs from "fs";
import { parseArgs } from "util";
import { FileSystemClient } from "@/clients/file-system.client";
import { AttachmentVersionsEnum } from "@/enums/attachment/attachment-versions.enum";
import { RestoreLayoutEnum } from "@/enums/attachment/restore-layout.enum";
import { ConversionService } from "@/services/conversion.service";
import type { AttachmentOptions, ConversionResult } from "@/types";
import {
  checkEnvironmentVariables,
  loadConversionConfig,
  parseEnumValue,
} from "@/utils/env.util";
import { ErrorHandler, errorMessage } from "@/utils/error-handler.util";
import { Logger, setLogLevel } from "@/utils/logger.util";

export const USAGE = `Usage: confluence-export-json <entities.xml> [options]

Options:
  -o, --output <file>            JSON file to write (default: confluence_data.json)
  -a, --attachments-dir <dir>    attachments directory of the export
  -r, --restore-dir <dir>        directory to restore attachments into (needs --attachments-dir)
      --layout <nested|flat>     directory layout of restored attachments
      --versions <all|latest>    restore every attachment version or only the latest
      --debug                    verbose diagnostics
  -h, --help                     show this help`;

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

interface CliArguments {
  input: string;
  output: string;
  attachments?: AttachmentOptions;
  debug: boolean;
}

type ParsedArguments = { ok: true; args: CliArguments } | { ok: false; error?: string };

function readArguments(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      "attachments-dir": { type: "string", short: "a" },
      "restore-dir": { type: "string", short: "r" },
      layout: { type: "string" },
      versions: { type: "string" },
      debug: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

function parseCliArguments(argv: string[]): ParsedArguments {
  const config = loadConversionConfig();

  let parsed: ReturnType<typeof readArguments>;
  try {
    parsed = readArguments(argv);
  } catch (error: unknown) {
    return { ok: false, error: errorMessage(error) };
  }

  const { values, positionals } = parsed;
  if (values.help) return { ok: false };

  const [input] = positionals;
  if (!input || positionals.length > 1) {
    return { ok: false, error: "Exactly one input file is required" };
  }

  const sourceDir = values["attachments-dir"];
  const restoreDir = values["restore-dir"];
  if (restoreDir && !sourceDir) {
    return { ok: false, error: "'--restore-dir' requires '--attachments-dir' to be specified as well" };
  }

  const layout = values.layout === undefined
    ? config.restoreLayout
    : parseEnumValue(RestoreLayoutEnum, values.layout);
  if (!layout) return { ok: false, error: `Unknown layout: ${values.layout}` };

  const versions = values.versions === undefined
    ? config.attachmentVersions
    : parseEnumValue(AttachmentVersionsEnum, values.versions);
  if (!versions) return { ok: false, error: `Unknown versions choice: ${values.versions}` };

  return {
    ok: true,
    args: {
      input,
      output: values.output ?? config.outputFile,
      attachments: sourceDir ? { sourceDir, restoreDir, layout, versions } : undefined,
      debug: values.debug ?? false,
    },
  };
}

/**
 * Runs the converter for the given command-line arguments and returns the exit code
 */
export function run(argv: string[], client: FileSystemClient = new FileSystemClient()): number {
  try {
    checkEnvironmentVariables();
  } catch (error: unknown) {
    console.error(errorMessage(error));
    return EXIT_FAILURE;
  }

  const parsed = parseCliArguments(argv);
  if (!parsed.ok) {
    if (parsed.error) {
      console.error(`Error: ${parsed.error}`);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    console.log(USAGE);
    return EXIT_SUCCESS;
  }

  const { args } = parsed;
  if (args.debug) setLogLevel("debug");

  const logger = new Logger({ context: "cli" });
  ErrorHandler.initialize("cli");

  if (!fs.existsSync(args.input)) {
    ErrorHandler.logError(ErrorHandler.createInputError(args.input, "File not found"), "run");
    return EXIT_FAILURE;
  }

  logger.info(`Parsing '${args.input}'`);
  let xml: string;
  try {
    xml = client.readExportFile(args.input);
  } catch (error: unknown) {
    ErrorHandler.logError(ErrorHandler.createInputError(args.input, errorMessage(error)), "run");
    return EXIT_FAILURE;
  }

  let result: ConversionResult;
  try {
    result = new ConversionService(client).convert(xml, { attachments: args.attachments });
  } catch (error: unknown) {
    ErrorHandler.handleUnexpectedError(error, "run");
    return EXIT_FAILURE;
  }
  if (!result.success) {
    return EXIT_FAILURE;
  }

  const { document } = result.data;
  try {
    client.writeJson(args.output, document);
  } catch (error: unknown) {
    ErrorHandler.logError(ErrorHandler.createOutputError(args.output, errorMessage(error)), "run");
    return EXIT_FAILURE;
  }

  logger.info(`Saved data to '${args.output}'`, document.summary);
  return EXIT_SUCCESS;
}
