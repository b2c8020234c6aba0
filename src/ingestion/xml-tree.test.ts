import { describe, it, expect } from 'vitest';
import { parseXmlTree, parseTitleDocument } from './xml-tree.js';
import { ParseError } from '../types/index.js';

describe('parseXmlTree', () => {
  it('should keep elements in document order with their leading text', async () => {
    const root = await parseXmlTree('<ROOT a="1"><A>x</A>tail<B/></ROOT>');

    expect(root).toEqual({
      label: 'ROOT',
      attributes: { a: '1' },
      text: null,
      children: [
        { label: 'A', attributes: {}, text: 'x', children: [] },
        { label: 'B', attributes: {}, text: null, children: [] },
      ],
    });
  });

  it('should drop text that follows an inline element', async () => {
    const root = await parseXmlTree('<P>Schools serve <I>nutritious</I> lunches.</P>');

    expect(root.text).toBe('Schools serve ');
    expect(root.children).toEqual([{ label: 'I', attributes: {}, text: 'nutritious', children: [] }]);
  });

  it('should leave whitespace-only leading text empty', async () => {
    const root = await parseXmlTree('<ROOT>\n  <A>x</A>\n  <B>y</B>\n</ROOT>');

    expect(root.text).toBeNull();
    expect(root.children.map((child) => child.text)).toEqual(['x', 'y']);
  });

  it('should decode entities and accept a Buffer', async () => {
    const root = await parseXmlTree(Buffer.from('<P>Fish &amp; Wildlife</P>', 'utf-8'));

    expect(root.text).toBe('Fish & Wildlife');
  });

  it('should throw ParseError for malformed XML', async () => {
    await expect(parseXmlTree('<ECFR><DIV3></ECFR>')).rejects.toBeInstanceOf(ParseError);
  });

  it('should throw ParseError for empty documents', async () => {
    await expect(parseXmlTree('')).rejects.toBeInstanceOf(ParseError);
    await expect(parseXmlTree('   \n')).rejects.toThrow('Document is empty');
  });

  it('should throw ParseError for an element after the root element', async () => {
    await expect(parseXmlTree('<ECFR><P>a</P></ECFR><X>b</X>')).rejects.toThrow(
      'Malformed XML: content after the root element'
    );
  });

  it('should throw ParseError for text after the root element', async () => {
    await expect(parseXmlTree('<ECFR><P>a</P></ECFR> junk')).rejects.toBeInstanceOf(ParseError);
    await expect(parseXmlTree('<ECFR/>junk')).rejects.toBeInstanceOf(ParseError);
  });

  it('should accept whitespace, comments and processing instructions after the root element', async () => {
    const root = await parseXmlTree('<?xml version="1.0"?>\n<ECFR a="x>y"><P>a</P></ECFR>\n<!-- end -->\n<?pi done?>\n');

    expect(root.label).toBe('ECFR');
    expect(root.children[0].text).toBe('a');
  });

  it('should throw ParseError for text that is not XML', async () => {
    await expect(parseXmlTree('not xml at all')).rejects.toBeInstanceOf(ParseError);
  });
});

describe('parseTitleDocument', () => {
  it('should tag the tree with title number and date', async () => {
    const document = await parseTitleDocument('<ECFR><P>text</P></ECFR>', 12, '2024-07-01');

    expect(document.titleNumber).toBe(12);
    expect(document.date).toBe('2024-07-01');
    expect(document.root.label).toBe('ECFR');
  });
});
