import { GMP_LIST_PATHS } from '@common/constants/gmp';
import { XmlNode } from '@types';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';

const LIST_PATHS = new Set<string>(GMP_LIST_PATHS);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (_tagName, jPath) => LIST_PATHS.has(jPath),
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  suppressEmptyNode: true,
});

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Serialize a command element, e.g. buildCommand('get_tasks', { '@_task_id': id })
 */
export function buildCommand(command: string, content: XmlNode = {}): string {
  return builder.build({ [command]: content });
}

/**
 * Parse a complete XML document into a node tree
 */
export function parseXml(xml: string): XmlNode {
  const parsed: unknown = parser.parse(xml);
  if (!isXmlNode(parsed)) {
    throw new Error('XML document has no root element');
  }
  return parsed;
}

/**
 * A response frame is complete once the buffer holds one well-formed document
 */
export function isCompleteDocument(buffer: string): boolean {
  const trimmed = buffer.trim();
  if (!trimmed.startsWith('<') || !trimmed.endsWith('>')) return false;
  return XMLValidator.validate(trimmed) === true;
}

export function child(node: XmlNode | undefined, key: string): XmlNode | undefined {
  const value = node?.[key];
  if (Array.isArray(value)) {
    const [first] = value;
    return isXmlNode(first) ? first : undefined;
  }
  return isXmlNode(value) ? value : undefined;
}

/**
 * Text content of a child element, whether it was parsed as a string or as a node with attributes
 */
export function text(node: XmlNode | undefined, key: string): string | undefined {
  const value = node?.[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isXmlNode(value)) {
    const inner = value['#text'];
    return typeof inner === 'string' || typeof inner === 'number' ? String(inner) : undefined;
  }
  return undefined;
}

export function attr(node: XmlNode | undefined, name: string): string | undefined {
  const value = node?.[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Child elements that may appear once or many times
 */
export function list(node: XmlNode | undefined, key: string): XmlNode[] {
  const value = node?.[key];
  if (Array.isArray(value)) return value.filter(isXmlNode);
  return isXmlNode(value) ? [value] : [];
}
