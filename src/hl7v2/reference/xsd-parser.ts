import { XMLParser } from "fast-xml-parser";
import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { XsdField, XsdSegment, XsdSegmentField, XsdDatatype, XsdDatatypeComponent, XsdMessage, XsdMessageElement } from "./types";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseAttributeValue: false,
  isArray: (name) =>
    ["xsd:attributeGroup", "xsd:complexType", "xsd:element", "xsd:attribute"].includes(name),
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(node: XmlNode | undefined, key: string): XmlNode | undefined {
  const value = node?.[key];
  return isNode(value) ? value : undefined;
}

function children(node: XmlNode | undefined, key: string): XmlNode[] {
  const value = node?.[key];
  if (value === undefined) return [];
  const list: unknown[] = Array.isArray(value) ? value : [value];
  return list.filter(isNode);
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

function parseSchema(text: string): XmlNode | undefined {
  const result: unknown = parser.parse(text);
  return isNode(result) ? child(result, "xsd:schema") : undefined;
}

function getFixedAttr(attrs: XmlNode[], attrName: string): string | null {
  const found = attrs.find((a) => attr(a, "name") === attrName);
  return found ? attr(found, "fixed") ?? null : null;
}

function parseCardinality(value: string): number | "unbounded" {
  return value === "unbounded" ? "unbounded" : parseInt(value, 10);
}

function sequenceElements(complexType: XmlNode): XmlNode[] {
  return children(child(complexType, "xsd:sequence"), "xsd:element");
}

/** Field attributes from fields.xsd (`PID.3.ATTRIBUTES` attribute groups). */
export function parseXsdFields(text: string): Map<string, XsdField> {
  const attrGroups = children(parseSchema(text), "xsd:attributeGroup");
  const fields = new Map<string, XsdField>();

  for (const ag of attrGroups) {
    const match = (attr(ag, "name") ?? "").match(/^(\w+)\.(\d+)\.ATTRIBUTES$/);
    if (!match?.[1] || !match[2]) continue;

    const segment = match[1];
    const position = parseInt(match[2], 10);
    const attrs = children(ag, "xsd:attribute");

    const item = getFixedAttr(attrs, "Item");
    const dataType = getFixedAttr(attrs, "Type");
    const longName = getFixedAttr(attrs, "LongName");
    const maxLengthStr = getFixedAttr(attrs, "maxLength");
    const tableRaw = getFixedAttr(attrs, "Table");

    if (!item || !dataType || !longName) continue;

    const table = tableRaw ? tableRaw.replace(/^HL7/, "") : null;

    fields.set(`${segment}.${position}`, {
      segment,
      position,
      item: item.padStart(5, "0"),
      dataType,
      longName,
      maxLength: maxLengthStr ? parseInt(maxLengthStr, 10) : null,
      table: table || null,
    });
  }

  return fields;
}

/** Segment field lists from segments.xsd (`PID.CONTENT` complex types). */
export function parseXsdSegments(text: string): Map<string, XsdSegment> {
  const complexTypes = children(parseSchema(text), "xsd:complexType");
  const segments = new Map<string, XsdSegment>();

  for (const ct of complexTypes) {
    // Match SEG.CONTENT but not SEG.N.CONTENT (those are field types)
    const segName = (attr(ct, "name") ?? "").match(/^([A-Z][A-Z0-9]{1,2})\.CONTENT$/)?.[1];
    if (!segName) continue;

    const fields: XsdSegmentField[] = [];

    for (const el of sequenceElements(ct)) {
      const ref = attr(el, "ref");
      const position = ref?.match(/^(\w+)\.(\d+)$/)?.[2];
      if (!ref || !position) continue;

      fields.push({
        field: ref,
        position: parseInt(position, 10),
        minOccurs: parseInt(attr(el, "minOccurs") ?? "0", 10),
        maxOccurs: parseCardinality(attr(el, "maxOccurs") ?? "1"),
      });
    }

    if (fields.length > 0) {
      segments.set(segName, { name: segName, fields });
    }
  }

  return segments;
}

/** Composite data types from datatypes.xsd. */
export function parseXsdDatatypes(text: string): Map<string, XsdDatatype> {
  const schema = parseSchema(text);

  // Component metadata lives in XX.N.ATTRIBUTES attribute groups
  const componentMeta = new Map<string, { dataType: string; longName: string; maxLength: number | null }>();

  for (const ag of children(schema, "xsd:attributeGroup")) {
    const match = (attr(ag, "name") ?? "").match(/^(\w+)\.(\d+)\.ATTRIBUTES$/);
    if (!match) continue;

    const attrs = children(ag, "xsd:attribute");
    const dataType = getFixedAttr(attrs, "Type");
    const longName = getFixedAttr(attrs, "LongName");
    const maxLengthStr = getFixedAttr(attrs, "maxLength");

    if (dataType && longName) {
      componentMeta.set(`${match[1]}.${match[2]}`, {
        dataType,
        longName,
        maxLength: maxLengthStr ? parseInt(maxLengthStr, 10) : null,
      });
    }
  }

  const datatypes = new Map<string, XsdDatatype>();

  for (const ct of children(schema, "xsd:complexType")) {
    const name = attr(ct, "name");
    // Composite datatype: no dots (not XX.CONTENT or XX.N.CONTENT)
    if (!name || name.includes(".")) continue;

    const components: XsdDatatypeComponent[] = [];

    for (const el of sequenceElements(ct)) {
      const ref = attr(el, "ref");
      const position = ref?.match(/^(\w+)\.(\d+)$/)?.[2];
      if (!ref || !position) continue;

      const meta = componentMeta.get(ref);
      if (!meta) continue;

      components.push({
        component: ref,
        position: parseInt(position, 10),
        dataType: meta.dataType,
        longName: meta.longName,
        maxLength: meta.maxLength,
      });
    }

    if (components.length > 0) {
      datatypes.set(name, { name, components });
    }
  }

  return datatypes;
}

/**
 * Message structure from one message XSD (e.g. ADT_A01.xsd).
 * Groups are message-prefixed (`ADT_A01.PROCEDURE`), segments are plain (`PR1`).
 */
export function parseXsdMessage(text: string, messageName: string): XsdMessage | null {
  const groupDefs = new Map<string, XmlNode[]>();

  for (const ct of children(parseSchema(text), "xsd:complexType")) {
    const typeName = attr(ct, "name");
    if (!typeName?.endsWith(".CONTENT")) continue;
    groupDefs.set(typeName.replace(/\.CONTENT$/, ""), sequenceElements(ct));
  }

  const rootElements = groupDefs.get(messageName);
  if (!rootElements) return null;

  const buildElements = (rawElements: XmlNode[], visited: Set<string>): XsdMessageElement[] => {
    const result: XsdMessageElement[] = [];
    for (const el of rawElements) {
      const ref = attr(el, "ref");
      if (!ref) continue;

      const minOccurs = parseInt(attr(el, "minOccurs") ?? "0", 10);
      const maxOccurs = parseCardinality(attr(el, "maxOccurs") ?? "1");

      const nested = ref !== messageName && !visited.has(ref) ? groupDefs.get(ref) : undefined;
      if (nested) {
        visited.add(ref);
        result.push({ group: ref, minOccurs, maxOccurs, elements: buildElements(nested, visited) });
      } else {
        result.push({ segment: ref, minOccurs, maxOccurs });
      }
    }
    return result;
  };

  return { name: messageName, elements: buildElements(rootElements, new Set()) };
}

export interface XsdBundle {
  fields: Map<string, XsdField>;
  segments: Map<string, XsdSegment>;
  datatypes: Map<string, XsdDatatype>;
  messages: Map<string, XsdMessage>;
}

/** Reads an unpacked HL7 XML schema directory (fields.xsd, segments.xsd, datatypes.xsd, one XSD per message). */
export async function readXsdDirectory(xsdDir: string): Promise<XsdBundle> {
  const coreFiles = new Set(["fields.xsd", "segments.xsd", "datatypes.xsd"]);
  const read = (file: string) => readFile(join(xsdDir, file), "utf-8");

  const [fieldsText, segmentsText, datatypesText, files] = await Promise.all([
    read("fields.xsd"),
    read("segments.xsd"),
    read("datatypes.xsd"),
    readdir(xsdDir),
  ]);

  const messages = new Map<string, XsdMessage>();
  for (const file of files.filter((f) => f.endsWith(".xsd") && !coreFiles.has(f))) {
    const name = file.replace(/\.xsd$/, "");
    const message = parseXsdMessage(await read(file), name);
    if (message) messages.set(name, message);
  }

  return {
    fields: parseXsdFields(fieldsText),
    segments: parseXsdSegments(segmentsText),
    datatypes: parseXsdDatatypes(datatypesText),
    messages,
  };
}
