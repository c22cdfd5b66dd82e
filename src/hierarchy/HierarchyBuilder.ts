import { DOCUMENT_ROOT_HEADING } from "../config";
import type { ClassifiedElement, Section } from "../types";
import { logger } from "../utils/logger";
import { fullTrim } from "../utils/string";

/**
 * Working node used while the stack is open. Converted into a frozen
 * {@link Section} once the whole stream has been consumed.
 */
interface OpenSection {
  heading: string;
  parts: string[];
  level: number;
  children: OpenSection[];
}

export interface HierarchyBuilderOptions {
  /** Heading of the section that collects content preceding the first heading */
  rootHeading?: string;
}

/**
 * Builds a section forest from a classified element stream in a single pass,
 * keeping the currently open sections on a stack ordered root to innermost.
 */
export class HierarchyBuilder {
  private readonly rootHeading: string;

  constructor(options: HierarchyBuilderOptions = {}) {
    this.rootHeading = options.rootHeading ?? DOCUMENT_ROOT_HEADING;
  }

  build(elements: readonly ClassifiedElement[]): Section[] {
    const roots: OpenSection[] = [];
    const stack: OpenSection[] = [];

    for (const element of elements) {
      const text = fullTrim(element.text);
      if (!text) {
        continue;
      }

      if (element.isHeading) {
        while (stack.length > 0 && stack[stack.length - 1].level >= element.level) {
          stack.pop();
        }
        const section: OpenSection = {
          heading: text,
          parts: [text],
          level: element.level,
          children: [],
        };
        const parent = stack[stack.length - 1];
        if (parent) {
          parent.children.push(section);
        } else {
          roots.push(section);
        }
        stack.push(section);
        continue;
      }

      let current = stack[stack.length - 1];
      if (!current) {
        // Content before any heading; the root carries no heading line of its own
        current = { heading: this.rootHeading, parts: [], level: 1, children: [] };
        roots.push(current);
        stack.push(current);
      }
      current.parts.push(text);
    }

    logger.debug(`Built ${roots.length} top-level sections from ${elements.length} elements`);
    return roots.map((root) => this.freeze(root));
  }

  private freeze(section: OpenSection): Section {
    return Object.freeze({
      heading: section.heading,
      content: section.parts.join("\n\n"),
      level: section.level,
      subsections: Object.freeze(section.children.map((child) => this.freeze(child))),
    });
  }
}

/**
 * Visits every section depth-first in document order.
 */
export function* walkSections(
  sections: readonly Section[],
  path: readonly string[] = [],
): Generator<{ section: Section; path: readonly string[] }> {
  for (const section of sections) {
    yield { section, path };
    yield* walkSections(section.subsections, [...path, section.heading]);
  }
}
