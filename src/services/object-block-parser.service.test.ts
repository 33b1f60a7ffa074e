import { describe, expect, it } from "vitest";
import {
  collection,
  element,
  entitiesXml,
  objectBlock,
  property,
  reference,
  typedProperty,
  userBlock,
} from "@/__fixtures__/entities.fixture";
import { StructuralParseError } from "@/utils/error-handler.util";
import { ObjectBlockParser } from "./object-block-parser.service";

describe("ObjectBlockParser", () => {
  it("decodes scalars, references and collections of an object block", () => {
    const xml = entitiesXml(
      objectBlock(
        "Page",
        "100",
        property("title", "Home"),
        reference("space", "Space", "7"),
        collection("bodyContents", element("BodyContent", "200"), element("BodyContent", "201")),
      ),
    );

    const [result] = [...ObjectBlockParser.parse(xml)];

    expect(result.ok).toBe(true);
    if (!result.ok) throw new Error("Expected a record");
    const { record } = result;
    expect(record.className).toBe("Page");
    expect(record.packageName).toBe("com.atlassian.confluence.pages");
    expect(record.id).toBe("100");
    expect(record.idName).toBe("id");
    expect(record.scalars.get("title")).toBe("Home");
    expect(record.references.get("space")).toEqual({ kind: "reference", id: "7", className: "Space" });
    expect(record.collections.get("bodyContents")).toEqual([
      { kind: "reference", id: "200", className: "BodyContent" },
      { kind: "reference", id: "201", className: "BodyContent" },
    ]);
  });

  it("yields blocks in document order with their positions", () => {
    const xml = entitiesXml(
      objectBlock("Label", "3", property("name", "c")),
      objectBlock("Label", "1", property("name", "a")),
      objectBlock("Label", "2", property("name", "b")),
    );

    const ids = [...ObjectBlockParser.parse(xml)].map((result) =>
      result.ok ? `${result.index}:${result.record.id}` : "skipped",
    );

    expect(ids).toEqual(["0:3", "1:1", "2:2"]);
  });

  it("reports a malformed block and keeps going", () => {
    const xml = entitiesXml(
      objectBlock("Page", null, property("title", "No id")),
      `<object package="com.example"><id name="id">5</id></object>`,
      objectBlock("Page", "6", property("title", "Fine")),
    );

    const results = [...ObjectBlockParser.parse(xml)];

    expect(results).toHaveLength(3);
    expect(results[0]).toEqual({
      ok: false,
      issue: { index: 0, className: "Page", reason: "Object block has no identifier" },
    });
    expect(results[1]).toEqual({
      ok: false,
      issue: { index: 1, className: undefined, reason: "Object block has no class attribute" },
    });
    const last = results[2];
    expect(last.ok && last.record.id).toBe("6");
  });

  it("treats an empty identifier as malformed", () => {
    const xml = entitiesXml(`<object class="Page"><id name="id">  </id></object>`);

    const [result] = [...ObjectBlockParser.parse(xml)];

    expect(result).toEqual({
      ok: false,
      issue: { index: 0, className: "Page", reason: "Object block has an empty identifier" },
    });
  });

  it("throws a structural error for markup that is not well-formed", () => {
    const xml = `<hibernate-generic><object class="Page"><id name="id">1</id></hibernate-generic>`;

    expect(() => [...ObjectBlockParser.parse(xml)]).toThrow(StructuralParseError);
  });

  it("coerces tagged scalars and leaves untagged ones raw", () => {
    const xml = entitiesXml(
      objectBlock(
        "Page",
        "1",
        typedProperty("count", "long", "5"),
        typedProperty("hidden", "boolean", "true"),
        typedProperty("stamp", "timestamp", "2021-03-18 14:21:51.000"),
        typedProperty("shape", "polygon", "square"),
        property("version", "4"),
        `<property name="nothing"/>`,
      ),
    );

    const [result] = [...ObjectBlockParser.parse(xml)];
    if (!result.ok) throw new Error("Expected a record");
    const { scalars } = result.record;

    expect(scalars.get("count")).toBe(5);
    expect(scalars.get("hidden")).toBe(true);
    expect(scalars.get("stamp")).toEqual(new Date("2021-03-18T14:21:51.000Z"));
    expect(scalars.get("shape")).toBe("square");
    expect(scalars.get("version")).toBe("4");
    expect(scalars.get("nothing")).toBeNull();
  });

  it("keeps markup inside CDATA untouched", () => {
    const xml = entitiesXml(objectBlock("BodyContent", "9", property("body", "<p>Hi &amp; bye</p>")));

    const [result] = [...ObjectBlockParser.parse(xml)];

    expect(result.ok && result.record.scalars.get("body")).toBe("<p>Hi &amp; bye</p>");
  });

  it("decodes numeric character references in plain text", () => {
    const xml = entitiesXml(objectBlock("Page", "1", `<property name="title">Caf&#233; &#x2014; Menu</property>`));

    const [result] = [...ObjectBlockParser.parse(xml)];

    expect(result.ok && result.record.scalars.get("title")).toBe("Café — Menu");
  });

  it("reads named refs inside embedded objects and ref collections", () => {
    const xml = entitiesXml(
      objectBlock(
        "Page",
        "2",
        collection("parent", `<ref class="Page"><id name="id">1</id></ref>`),
        collection("labellings", `<object class="Labelling"><ref name="label"><id>5</id></ref></object>`),
      ),
    );

    const [result] = [...ObjectBlockParser.parse(xml)];
    if (!result.ok) throw new Error("Expected a record");
    const [labelling] = result.record.collections.get("labellings") ?? [];

    expect(result.record.collections.get("parent")).toEqual([{ kind: "reference", id: "1", className: "Page" }]);
    if (labelling.kind !== "record") throw new Error("Expected an embedded record");
    expect(labelling.record.references.get("label")).toEqual({ kind: "reference", id: "5" });
  });

  it("decodes anonymous objects inside a collection as embedded records", () => {
    const xml = entitiesXml(
      objectBlock(
        "Page",
        "1",
        collection("entries", `<object class="Entry">${property("key", "a")}</object>`, `<element>plain</element>`),
      ),
    );

    const [result] = [...ObjectBlockParser.parse(xml)];
    if (!result.ok) throw new Error("Expected a record");
    const [embedded, scalar] = result.record.collections.get("entries") ?? [];

    expect(embedded.kind).toBe("record");
    if (embedded.kind !== "record") throw new Error("Expected an embedded record");
    expect(embedded.record.className).toBe("Entry");
    expect(embedded.record.id).toBeUndefined();
    expect(embedded.record.scalars.get("key")).toBe("a");
    expect(scalar).toEqual({ kind: "scalar", value: "plain" });
  });

  it("reads user keys from id elements named key", () => {
    const xml = entitiesXml(userBlock("8a7f808a", property("name", "jdoe")));

    const [result] = [...ObjectBlockParser.parse(xml)];

    expect(result.ok && result.record.id).toBe("8a7f808a");
    expect(result.ok && result.record.idName).toBe("key");
  });

  it("degrades a reference without identifier to null", () => {
    const xml = entitiesXml(objectBlock("Page", "1", `<property name="parent" class="Page"><id name="id"></id></property>`));

    const [result] = [...ObjectBlockParser.parse(xml)];
    if (!result.ok) throw new Error("Expected a record");

    expect(result.record.references.has("parent")).toBe(false);
    expect(result.record.scalars.get("parent")).toBeNull();
  });

  it("starts over from the beginning on every call", () => {
    const xml = entitiesXml(objectBlock("Label", "1"), objectBlock("Label", "2"));

    const first = [...ObjectBlockParser.parse(xml)];
    const second = [...ObjectBlockParser.parse(xml)];

    expect(second).toEqual(first);
    expect(second).toHaveLength(2);
  });
});
