/**
 * Parses eCFR title XML into an ordered element tree.
 *
 * xml2js is run with ordered children so that element and text content keep
 * their document order:
 *
 *   <P>Schools serve <I>nutritious</I> lunches daily.</P>
 *
 * arrives as an element `P` whose `$$` children are the text chunk
 * "Schools serve ", the element `I` and the text chunk " lunches daily.".
 * Each element keeps only the text before its first child element, so `P`
 * gets "Schools serve " and `I` gets "nutritious"; the tail " lunches daily."
 * is dropped.
 */

import { parseStringPromise } from 'xml2js';
import { ElementNode, ParseError, TitleDocument } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('xml-tree');

const TEXT_NODE_NAME = '__text__';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) {
    return attributes;
  }
  for (const [key, attr] of Object.entries(value)) {
    if (typeof attr === 'string') {
      attributes[key] = attr;
    }
  }
  return attributes;
}

function toElement(raw: Record<string, unknown>): ElementNode {
  const label = raw['#name'];
  if (typeof label !== 'string') {
    throw new ParseError('Element without a tag name in parsed XML');
  }

  let text: string | null = null;
  const children: ElementNode[] = [];
  const rawChildren = raw['$$'];

  if (Array.isArray(rawChildren)) {
    for (const child of rawChildren) {
      if (!isRecord(child)) {
        continue;
      }

      if (child['#name'] === TEXT_NODE_NAME) {
        // The SAX parser may split one text run into several chunks
        if (children.length === 0) {
          text = (text ?? '') + (typeof child['_'] === 'string' ? child['_'] : '');
        }
        continue;
      }

      children.push(toElement(child));
    }
  }

  return {
    label,
    attributes: toAttributes(raw['$']),
    text,
    children,
  };
}

// Comments, CDATA, processing instructions, doctype, then tags with quoted attributes
const MARKUP_PATTERN =
  /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE(?:[^[>]|\[[\s\S]*?\])*>|<(\/?)[^\s/>!?]+(?:\s+[^\s=/>]+\s*=\s*(?:"[^"]*"|'[^']*'))*\s*(\/?)>/g;

const TRAILING_MISC_PATTERN = /<!--[\s\S]*?-->|<\?[\s\S]*?\?>/g;

/**
 * Offset just past the root element's end tag, or -1 when it cannot be found
 */
function rootEndOffset(xml: string): number {
  const pattern = new RegExp(MARKUP_PATTERN.source, 'g');
  let depth = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(xml)) !== null) {
    const token = match[0];
    if (token.startsWith('<!') || token.startsWith('<?')) {
      continue;
    }
    if (match[1] === '/') {
      depth--;
      if (depth === 0) {
        return pattern.lastIndex;
      }
    } else if (match[2] === '/') {
      if (depth === 0) {
        return pattern.lastIndex;
      }
    } else {
      depth++;
    }
  }

  return -1;
}

/**
 * Parse raw XML into the root element of a document tree
 */
export async function parseXmlTree(xml: string | Buffer): Promise<ElementNode> {
  const xmlString = typeof xml === 'string' ? xml : xml.toString('utf-8');

  if (xmlString.trim().length === 0) {
    throw new ParseError('Document is empty');
  }

  let parsed: unknown;
  try {
    parsed = await parseStringPromise(xmlString, {
      explicitChildren: true,
      preserveChildrenOrder: true,
      charsAsChildren: true,
      includeWhiteChars: false,
    });
  } catch (error) {
    throw new ParseError(
      `Malformed XML: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  if (!isRecord(parsed)) {
    throw new ParseError('Document has no root element');
  }

  const [root] = Object.values(parsed);
  if (!isRecord(root)) {
    throw new ParseError('Document has no root element');
  }

  const rootEnd = rootEndOffset(xmlString);
  if (rootEnd >= 0 && xmlString.slice(rootEnd).replace(TRAILING_MISC_PATTERN, '').trim().length > 0) {
    throw new ParseError('Malformed XML: content after the root element');
  }

  return toElement(root);
}

/**
 * Parse one title's XML for one effective date
 */
export async function parseTitleDocument(
  xml: string | Buffer,
  titleNumber: number,
  date: string
): Promise<TitleDocument> {
  const root = await parseXmlTree(xml);

  logger.debug({ titleNumber, date, root: root.label }, 'Parsed title XML');

  return { titleNumber, date, root };
}
