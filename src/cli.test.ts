import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { entitiesXml, objectBlock, property, reference } from "@/__fixtures__/entities.fixture";
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, run, USAGE } from "./cli";

describe("run", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-"));
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  function writeInput(content: string): string {
    const filePath = path.join(workDir, "entities.xml");
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  it("converts an export into a JSON file", () => {
    const input = writeInput(
      entitiesXml(
        objectBlock("Page", "1", property("title", "Home"), reference("space", "Space", "2")),
        objectBlock("Space", "2", property("key", "DOC")),
      ),
    );
    const output = path.join(workDir, "out.json");

    expect(run([input, "-o", output])).toBe(EXIT_SUCCESS);

    const written: unknown = JSON.parse(fs.readFileSync(output, "utf-8"));
    expect(written).toMatchObject({
      pages: [{ id: "1", title: "Home", space_key: "DOC" }],
      others: [{ id: "2", type: "Space", properties: { key: "DOC" } }],
    });
  });

  it("restores attachments next to the JSON output", () => {
    const input = writeInput(
      entitiesXml(
        objectBlock("Page", "42", property("title", "Files")),
        objectBlock("Attachment", "7", property("title", "a.txt"), property("version", "1"), reference("containerContent", "Page", "42")),
      ),
    );
    const attachmentsDir = path.join(workDir, "attachments");
    fs.mkdirSync(path.join(attachmentsDir, "42", "7"), { recursive: true });
    fs.writeFileSync(path.join(attachmentsDir, "42", "7", "1"), "text");
    const restoreDir = path.join(workDir, "restored");
    const output = path.join(workDir, "out.json");

    expect(run([input, "-o", output, "-a", attachmentsDir, "-r", restoreDir, "--layout", "flat"])).toBe(EXIT_SUCCESS);

    expect(fs.readFileSync(path.join(restoreDir, "7_a.txt"), "utf-8")).toBe("text");
  });

  it("prints usage for missing arguments", () => {
    expect(run([])).toBe(EXIT_USAGE);
    expect(console.error).toHaveBeenCalledWith("Error: Exactly one input file is required");
  });

  it("rejects a restore directory without an attachments directory", () => {
    expect(run(["entities.xml", "-r", "restored"])).toBe(EXIT_USAGE);
    expect(console.error).toHaveBeenCalledWith(
      "Error: '--restore-dir' requires '--attachments-dir' to be specified as well",
    );
  });

  it("rejects an unknown layout", () => {
    expect(run(["entities.xml", "--layout", "spiral"])).toBe(EXIT_USAGE);
    expect(console.error).toHaveBeenCalledWith("Error: Unknown layout: spiral");
  });

  it("prints help and succeeds", () => {
    expect(run(["--help"])).toBe(EXIT_SUCCESS);
    expect(console.log).toHaveBeenCalledWith(USAGE);
  });

  it("fails for a missing input file", () => {
    expect(run([path.join(workDir, "absent.xml")])).toBe(EXIT_FAILURE);
  });

  it("fails without writing output for malformed input", () => {
    const input = writeInput("<hibernate-generic><object>");
    const output = path.join(workDir, "out.json");

    expect(run([input, "-o", output])).toBe(EXIT_FAILURE);
    expect(fs.existsSync(output)).toBe(false);
  });
});
