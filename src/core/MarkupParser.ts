import { SaxesParser, type SaxesTagPlain } from 'saxes';
import type { MarkupElement } from '../types/index.js';
import { ParseError, errorMessage } from './errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Element under construction while the scan is open.
 */
interface ElementBuilder {
  tag: string;
  attributes: Map<string, string>;
  children: MarkupElement[];
  text?: string;
}

/**
 * Drops a namespace prefix, so `svg:rect` reads as `rect`.
 */
function localName(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}

function isNamespaceDeclaration(name: string): boolean {
  return name === 'xmlns' || name.startsWith('xmlns:');
}

function readAttributes(tag: SaxesTagPlain): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const [name, value] of Object.entries(tag.attributes)) {
    if (!isNamespaceDeclaration(name)) {
      attributes.set(localName(name), value);
    }
  }
  return attributes;
}

/**
 * Result of one forward scan.
 * `root` is set as soon as the first start tag is read; `error` is the scan
 * failure that ended the pass early, if any.
 */
interface ScanResult {
  root?: MarkupElement;
  error?: unknown;
}

/**
 * Scans markup once, building the tree on an open-element stack.
 * Stops at the first tokenizer error and keeps whatever was built before it.
 */
function scanMarkup(markup: string): ScanResult {
  const saxes = new SaxesParser();
  const open: ElementBuilder[] = [];
  const result: ScanResult = {};

  saxes.on('opentag', (tag: SaxesTagPlain) => {
    const parent = open[open.length - 1];
    if (!parent && result.root) {
      return;
    }

    const element: ElementBuilder = {
      tag: localName(tag.name),
      attributes: readAttributes(tag),
      children: [],
    };
    if (parent) {
      parent.children.push(element);
    } else {
      result.root = element;
    }
    open.push(element);
  });

  saxes.on('closetag', () => {
    open.pop();
  });

  saxes.on('text', (text: string) => {
    const current = open[open.length - 1];
    const run = text.trim();
    if (current && run) {
      current.text = run;
    }
  });

  try {
    saxes.write(markup).close();
  } catch (error) {
    result.error = error;
  }

  return result;
}

/**
 * Parses markup text into a generic element tree.
 *
 * The tree is not validated against any schema: unknown tags and attributes are
 * kept as they are. Once the root element has opened, a truncated or malformed
 * tail ends the scan and the tree read so far is returned.
 */
export class MarkupParser {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'MarkupParser');
  }

  /**
   * Parses markup and returns its root element.
   *
   * @throws ParseError if no start tag is read before the input ends or the scan fails
   */
  parse(markup: string): MarkupElement {
    const { root, error } = scanMarkup(markup);

    if (!root) {
      const detail = error === undefined ? '' : `: ${errorMessage(error)}`;
      throw new ParseError(`No root element found${detail}`, { cause: error });
    }

    if (error !== undefined) {
      this.logger.debug('Markup scan stopped early', { error: errorMessage(error) });
    }
    this.logger.debug('Parsed markup', {
      root: root.tag,
      elements: countElements(root),
    });
    return root;
  }
}

/**
 * Parses markup text into its root element.
 *
 * @throws ParseError if the input holds no element
 */
export function parseMarkup(markup: string, logger?: ILogger): MarkupElement {
  return new MarkupParser(logger).parse(markup);
}

/**
 * Gets an attribute value from an element.
 */
export function getAttribute(element: MarkupElement, name: string): string | undefined {
  return element.attributes.get(name);
}

/**
 * Counts the element and all of its descendants.
 */
export function countElements(element: MarkupElement): number {
  let count = 0;
  const stack: MarkupElement[] = [element];
  let current = stack.pop();
  while (current) {
    count++;
    stack.push(...current.children);
    current = stack.pop();
  }
  return count;
}
