import { XMLParser, XMLValidator } from 'fast-xml-parser';

export type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true
});

/**
 * Parse a document after validating it; returns null for malformed input
 */
export function parseXML(xml: string): XmlNode | null {
  if (xml.trim().length === 0 || XMLValidator.validate(xml) !== true) {
    return null;
  }
  const parsed: unknown = parser.parse(xml);
  return isXmlNode(parsed) ? parsed : null;
}

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Repeated elements parse to an array, single ones to the element itself
 */
export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === '') {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

export function childNode(node: XmlNode, key: string): XmlNode | undefined {
  const value = node[key];
  return isXmlNode(value) ? value : undefined;
}

/**
 * Text of an element, whether or not it also carries attributes
 */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (isXmlNode(value)) {
    const text = value['#text'];
    return typeof text === 'string' ? text : undefined;
  }
  return undefined;
}

export function attributeOf(node: unknown, name: string): string | undefined {
  if (!isXmlNode(node)) {
    return undefined;
  }
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
