/**
 * OrderedXml - typed, document-order XML tree for OOXML parts
 *
 * fast-xml-parser runs in preserveOrder mode so that runs, hyperlinks and field
 * characters keep their sequence; its loosely typed output is converted into
 * XmlElement/XmlText nodes on the way in and back on the way out.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';

const ATTR_PREFIX = '@_';
const ATTR_KEY = ':@';
const TEXT_KEY = '#text';

export interface XmlElement {
  kind: 'element';
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export interface XmlText {
  kind: 'text';
  value: string;
}

export type XmlNode = XmlElement | XmlText;

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  processEntities: true,
  htmlEntities: true,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_KEY,
  format: false,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
  processEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) {
    return attributes;
  }
  for (const [key, raw] of Object.entries(value)) {
    const name = key.startsWith(ATTR_PREFIX) ? key.slice(ATTR_PREFIX.length) : key;
    attributes[name] = String(raw);
  }
  return attributes;
}

function fromOrdered(entries: unknown): XmlNode[] {
  if (!Array.isArray(entries)) {
    return [];
  }

  const nodes: XmlNode[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;

    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTR_KEY) continue;
      if (key === TEXT_KEY) {
        nodes.push({ kind: 'text', value: String(value) });
        continue;
      }
      nodes.push({
        kind: 'element',
        name: key,
        attributes: toAttributes(entry[ATTR_KEY]),
        children: fromOrdered(value),
      });
    }
  }
  return nodes;
}

function toOrdered(nodes: XmlNode[]): Array<Record<string, unknown>> {
  return nodes.map((node) => {
    if (node.kind === 'text') {
      return { [TEXT_KEY]: node.value };
    }

    let children = toOrdered(node.children);
    // Processing instructions are written from their (empty) text child
    if (node.name.startsWith('?') && children.length === 0) {
      children = [{ [TEXT_KEY]: '' }];
    }

    const entry: Record<string, unknown> = { [node.name]: children };
    const attributeNames = Object.keys(node.attributes);
    if (attributeNames.length > 0) {
      const attrs: Record<string, string> = {};
      for (const name of attributeNames) {
        attrs[ATTR_PREFIX + name] = node.attributes[name];
      }
      entry[ATTR_KEY] = attrs;
    }
    return entry;
  });
}

/**
 * Parse an XML string into top-level nodes
 *
 * @throws Error when the XML is not well-formed
 */
export function parseXml(xml: string): XmlNode[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new Error(`${msg} (line ${line}, column ${col})`);
  }
  const parsed: unknown = parser.parse(xml);
  return fromOrdered(parsed);
}

export function buildXml(nodes: XmlNode[]): string {
  const built: unknown = builder.build(toOrdered(nodes));
  if (typeof built !== 'string') {
    throw new Error('XML builder did not produce a string');
  }
  return built;
}

export function createElement(
  name: string,
  attributes: Record<string, string> = {},
  children: XmlNode[] = []
): XmlElement {
  return { kind: 'element', name, attributes, children };
}

export function childElements(element: XmlElement, name?: string): XmlElement[] {
  const result: XmlElement[] = [];
  for (const child of element.children) {
    if (child.kind === 'element' && (name === undefined || child.name === name)) {
      result.push(child);
    }
  }
  return result;
}

export function firstChild(element: XmlElement, name: string): XmlElement | undefined {
  return childElements(element, name)[0];
}

export function rootElement(nodes: XmlNode[], name: string): XmlElement | undefined {
  for (const node of nodes) {
    if (node.kind === 'element' && node.name === name) {
      return node;
    }
  }
  return undefined;
}

/**
 * Pre-order descendants named `name`. Elements named in `stopAt` are not
 * entered (they can still match themselves).
 */
export function descendants(element: XmlElement, name: string, stopAt: string[] = []): XmlElement[] {
  const result: XmlElement[] = [];
  const visit = (node: XmlElement): void => {
    for (const child of childElements(node)) {
      if (child.name === name) {
        result.push(child);
      }
      if (!stopAt.includes(child.name)) {
        visit(child);
      }
    }
  };
  visit(element);
  return result;
}

/** Concatenated direct text children */
export function textContent(element: XmlElement): string {
  let text = '';
  for (const child of element.children) {
    if (child.kind === 'text') {
      text += child.value;
    }
  }
  return text;
}

export function setTextContent(element: XmlElement, value: string): void {
  element.children = value === '' ? [] : [{ kind: 'text', value }];
}
