import { load, type CheerioAPI } from 'cheerio';
import { isTag, type AnyNode, type Element } from 'domhandler';

/**
 * The few queries the scrapers need from a parsed page.
 *
 * `attributes` match exactly, except `class`: every class token listed has to
 * be present on the element, in any order.
 */
export interface DocumentQuery<TNode> {
  findAll(tag: string, attributes?: Record<string, string>, within?: TNode): TNode[];
  attribute(node: TNode, name: string): string | undefined;
  text(node: TNode): string;
}

const classTokens = (value: string) => value.split(/\s+/).filter(Boolean);

export class CheerioDocument implements DocumentQuery<Element> {
  private readonly $: CheerioAPI;

  constructor(markup: string) {
    this.$ = load(markup);
  }

  findAll(tag: string, attributes: Record<string, string> = {}, within?: Element): Element[] {
    const candidates: AnyNode[] = within
      ? this.$(within).find(tag).toArray()
      : this.$(tag).toArray();
    return candidates.filter(
      (node): node is Element => isTag(node) && this.matches(node, attributes)
    );
  }

  attribute(node: Element, name: string): string | undefined {
    return this.$(node).attr(name);
  }

  text(node: Element): string {
    return this.$(node).text();
  }

  private matches(node: Element, attributes: Record<string, string>): boolean {
    return Object.entries(attributes).every(([name, expected]) => {
      const actual = this.attribute(node, name);
      if (actual === undefined) return false;
      if (name !== 'class') return actual === expected;

      const present = new Set(classTokens(actual));
      return classTokens(expected).every((token) => present.has(token));
    });
  }
}
