/**
 * Text extraction for eCFR titles.
 *
 * Chapters are `DIV3` elements with `TYPE="CHAPTER"`; the chapter code lives in
 * the `N` attribute and the heading in a direct `HEAD` child:
 *
 *   <DIV3 N="II" TYPE="CHAPTER">
 *     <HEAD>CHAPTER II—FOOD AND NUTRITION SERVICE</HEAD>
 *     ...
 *   </DIV3>
 *
 * Extracted text is the stripped, non-blank leading text of every element in
 * document order, joined with a single space. Text that follows a child element
 * is not part of the output, so `<P>a <I>b</I> c</P>` extracts as "a b". Checksums are computed over this text, so the
 * output for a given tree and filter must never vary.
 */

import { ChapterFilter, ChapterNode, ElementNode, TitleDocument } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('title-parser');

const CHAPTER_LABEL = 'DIV3';
const CHAPTER_TYPE = 'CHAPTER';
const HEADING_LABEL = 'HEAD';

function isChapter(node: ElementNode): boolean {
  return node.label === CHAPTER_LABEL && node.attributes.TYPE === CHAPTER_TYPE;
}

/**
 * Collect the stripped leading text of a node and its descendants in document order
 */
export function collectTextFragments(node: ElementNode, fragments: string[] = []): string[] {
  const stripped = node.text?.trim() ?? '';
  if (stripped.length > 0) {
    fragments.push(stripped);
  }
  for (const child of node.children) {
    collectTextFragments(child, fragments);
  }
  return fragments;
}

export function subtreeText(node: ElementNode): string {
  return collectTextFragments(node).join(' ');
}

function chapterHeading(node: ElementNode): string | undefined {
  for (const child of node.children) {
    if (child.label === HEADING_LABEL) {
      const heading = child.text?.trim() ?? '';
      return heading.length > 0 ? heading : undefined;
    }
  }
  return undefined;
}

/**
 * Find chapter nodes in document order. A matched chapter's subtree is not
 * searched again, so chapters never overlap.
 */
export function findChapters(root: ElementNode): ChapterNode[] {
  const chapters: ChapterNode[] = [];

  const visit = (node: ElementNode): void => {
    if (isChapter(node)) {
      chapters.push({
        code: (node.attributes.N ?? '').toUpperCase(),
        heading: chapterHeading(node),
        node,
      });
      return;
    }
    node.children.forEach(visit);
  };

  visit(root);
  return chapters;
}

/**
 * Normalize a list of chapter codes into a filter. Empty input means the whole title.
 */
export function toChapterFilter(codes: Iterable<string> | null | undefined): ChapterFilter {
  if (!codes) {
    return null;
  }
  const normalized = new Set<string>();
  for (const code of codes) {
    const trimmed = code.trim().toUpperCase();
    if (trimmed.length > 0) {
      normalized.add(trimmed);
    }
  }
  return normalized.size > 0 ? normalized : null;
}

function matchingChapters(document: TitleDocument, filter: ChapterFilter): ChapterNode[] {
  const chapters = findChapters(document.root);
  const normalized = toChapterFilter(filter);
  if (!normalized) {
    return chapters;
  }
  return chapters.filter((chapter) => chapter.code.length > 0 && normalized.has(chapter.code));
}

/**
 * Flat mode: one string for the whole title, or only for the chapters in the filter
 */
export function extractText(document: TitleDocument, filter: ChapterFilter = null): string {
  if (!toChapterFilter(filter)) {
    return subtreeText(document.root);
  }

  const chapters = matchingChapters(document, filter);
  const fragments: string[] = [];
  for (const chapter of chapters) {
    collectTextFragments(chapter.node, fragments);
  }

  logger.debug(
    {
      titleNumber: document.titleNumber,
      date: document.date,
      chapters: chapters.map((chapter) => chapter.code),
      fragments: fragments.length,
    },
    'Extracted chapter text'
  );

  return fragments.join(' ');
}

/**
 * Sectioned mode: chapter heading (or "Chapter <code>") to that chapter's text.
 * Every chapter is included when the filter is empty.
 */
export function extractSections(
  document: TitleDocument,
  filter: ChapterFilter = null
): Map<string, string> {
  const sections = new Map<string, string>();

  for (const chapter of matchingChapters(document, filter)) {
    const heading = chapter.heading ?? `Chapter ${chapter.code}`;
    sections.set(heading, subtreeText(chapter.node));
  }

  return sections;
}
