/**
 * Anchor extraction behind a small parser interface
 */
import { parseHTML } from 'linkedom';

/**
 * What the scanner needs from an HTML parser: the anchor elements of a
 * document, and a way to read one attribute from each.
 */
export interface HtmlDocumentParser<E> {
  parseDocument(html: string): E[];
  attribute(element: E, name: string): string | undefined;
}

/**
 * Attribute lookup ignoring name case. linkedom keeps attribute names as
 * written, so `getAttribute('href')` misses `<a HREF>`.
 */
function findAttribute(element: Element, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const attr of Array.from(element.attributes)) {
    if (attr.name.toLowerCase() === wanted) return attr.value;
  }
  return undefined;
}

export const linkedomParser: HtmlDocumentParser<Element> = {
  parseDocument(html: string): Element[] {
    const { document } = parseHTML(html);
    return Array.from(document.querySelectorAll('a')).filter(
      (anchor) => findAttribute(anchor, 'href') !== undefined
    );
  },
  attribute: findAttribute,
};

/**
 * Raw href values of every anchor in document order.
 * linkedom is lenient, so broken markup yields fewer anchors rather than an error.
 */
export function extractAnchorHrefs<E>(
  html: string,
  parser: HtmlDocumentParser<E>
): Array<string | undefined>;
export function extractAnchorHrefs(html: string): Array<string | undefined>;
export function extractAnchorHrefs<E>(
  html: string,
  parser?: HtmlDocumentParser<E>
): Array<string | undefined> {
  if (!parser) return collect(html, linkedomParser);
  return collect(html, parser);
}

function collect<E>(html: string, parser: HtmlDocumentParser<E>): Array<string | undefined> {
  return parser.parseDocument(html).map((element) => parser.attribute(element, 'href'));
}
