import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type {
  BrokenBuildRef,
  BuildDetail,
  BuildTypeDetail,
  InvestigationRecord,
} from '../core/types.js';

/**
 * Minimal element tree. The decision logic only reads element names and
 * attributes, so text content is dropped while parsing.
 */
export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
}

const ATTRIBUTES_KEY = ':@';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseAttributeValue: false,
  parseTagValue: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') attributes[key] = value;
    else if (typeof value === 'number' || typeof value === 'boolean') attributes[key] = String(value);
  }
  return attributes;
}

function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) return [];
  const list: unknown[] = nodes;
  const elements: XmlElement[] = [];
  for (const node of list) {
    if (!isRecord(node)) continue;
    const name = Object.keys(node).find((k) => k !== ATTRIBUTES_KEY && k !== '#text');
    if (!name) continue;
    elements.push({
      name,
      attributes: toAttributes(node[ATTRIBUTES_KEY]),
      children: toElements(node[name]),
    });
  }
  return elements;
}

export type ParsedDocument =
  | { kind: 'document'; root: XmlElement }
  | { kind: 'empty' }
  | { kind: 'malformed'; reason: string };

export function parseDocument(xml: string): ParsedDocument {
  if (xml.trim() === '') return { kind: 'empty' };
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    return { kind: 'malformed', reason: `${msg} (line ${line})` };
  }
  const [root] = toElements(parser.parse(xml));
  return root ? { kind: 'document', root } : { kind: 'empty' };
}

export function child(el: XmlElement | undefined, name: string): XmlElement | undefined {
  return el?.children.find((c) => c.name === name);
}

export function attr(el: XmlElement | undefined, name: string): string | undefined {
  return el?.attributes[name];
}

/** Follows a chain of first-matching child elements. */
export function descend(el: XmlElement | undefined, ...names: string[]): XmlElement | undefined {
  return names.reduce<XmlElement | undefined>((cur, n) => child(cur, n), el);
}

// Semantic views ---------------------------------------------------------------

/** Every child of a `<builds>` collection that carries an href. */
export function readBuildCollection(root: XmlElement): {
  refs: BrokenBuildRef[];
  skipped: number;
} {
  const refs: BrokenBuildRef[] = [];
  let skipped = 0;
  for (const el of root.children) {
    const href = attr(el, 'href');
    if (href) refs.push({ href });
    else skipped += 1;
  }
  return { refs, skipped };
}

export function readBuildDetail(root: XmlElement): BuildDetail {
  const buildType = child(root, 'buildType');
  const triggered = child(root, 'triggered');
  return {
    buildType: buildType
      ? { href: attr(buildType, 'href'), name: attr(buildType, 'name') }
      : undefined,
    triggeredBy:
      attr(triggered, 'type') === 'user' ? attr(descend(triggered, 'user'), 'name') : undefined,
  };
}

export function readBuildTypeDetail(root: XmlElement): BuildTypeDetail {
  return { investigationsHref: attr(child(root, 'investigations'), 'href') };
}

/** First `<investigation>` of an investigations collection, if it has a state. */
export function readInvestigation(root: XmlElement): InvestigationRecord | undefined {
  const investigation = child(root, 'investigation');
  const state = attr(investigation, 'state');
  if (state === undefined) return undefined;
  return {
    state,
    assignee: attr(descend(investigation, 'assignment', 'user'), 'name'),
  };
}
