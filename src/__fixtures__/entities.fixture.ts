/**
 * Builders for small entities.xml documents used across tests
 */

const PACKAGES: Record<string, string> = {
  Page: "com.atlassian.confluence.pages",
  BlogPost: "com.atlassian.confluence.pages",
  Attachment: "com.atlassian.confluence.pages",
  BodyContent: "com.atlassian.confluence.core",
  ContentProperty: "com.atlassian.confluence.content",
  CustomContentEntityObject: "com.atlassian.confluence.content",
  Label: "com.atlassian.confluence.labels",
  Labelling: "com.atlassian.confluence.labels",
  Space: "com.atlassian.confluence.spaces",
  ConfluenceUserImpl: "com.atlassian.confluence.user",
};

function packageAttribute(className: string): string {
  const packageName = PACKAGES[className];
  return packageName ? ` package="${packageName}"` : "";
}

export function entitiesXml(...blocks: string[]): string {
  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<hibernate-generic datetime="2024-05-01 10:00:00">`,
    ...blocks,
    `</hibernate-generic>`,
  ].join("\n");
}

export function objectBlock(className: string, id: string | null, ...members: string[]): string {
  const idElement = id === null ? [] : [`<id name="id">${id}</id>`];
  return [`<object class="${className}"${packageAttribute(className)}>`, ...idElement, ...members, `</object>`].join(
    "\n",
  );
}

export function userBlock(key: string, ...members: string[]): string {
  return [
    `<object class="ConfluenceUserImpl"${packageAttribute("ConfluenceUserImpl")}>`,
    `<id name="key"><![CDATA[${key}]]></id>`,
    ...members,
    `</object>`,
  ].join("\n");
}

export function property(name: string, value: string): string {
  return `<property name="${name}"><![CDATA[${value}]]></property>`;
}

export function typedProperty(name: string, type: string, value: string): string {
  return `<property name="${name}" type="${type}">${value}</property>`;
}

export function reference(name: string, className: string, id: string): string {
  const idName = className === "ConfluenceUserImpl" ? "key" : "id";
  return `<property name="${name}" class="${className}"${packageAttribute(className)}><id name="${idName}">${id}</id></property>`;
}

export function element(className: string, id: string): string {
  return `<element class="${className}"${packageAttribute(className)}><id name="id">${id}</id></element>`;
}

export function collection(name: string, ...items: string[]): string {
  return [`<collection name="${name}" class="java.util.Collection">`, ...items, `</collection>`].join("\n");
}
