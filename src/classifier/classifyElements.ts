import { DEFAULT_HEADING_LEVEL } from "../config";
import type { ClassificationResult, ClassifiedElement, Element } from "../types";
import { logger } from "../utils/logger";
import type { ClassifyOptions, HeadingClassifier } from "./types";

export interface ClassifyElementsResult {
  elements: ClassifiedElement[];
  /** Number of fragments a remote classifier had to hand to its rule-based fallback */
  fallbackCount: number;
}

/**
 * Assigns a level to every element the extractor left unclassified.
 *
 * Elements that already carry a level pass through untouched. Table cells are
 * always content. Extractor headings without a level stay headings and only
 * take the classified level. All remaining texts go to the classifier in a
 * single batch, in document order.
 */
export async function classifyElements(
  elements: readonly Element[],
  classifier: HeadingClassifier,
  options: ClassifyOptions = {},
): Promise<ClassifyElementsResult> {
  const pendingIndexes: number[] = [];
  elements.forEach((element, index) => {
    if (element.level === undefined && element.kind !== "table_cell") {
      pendingIndexes.push(index);
    }
  });

  const results =
    pendingIndexes.length > 0
      ? await classifier.classifyBatch(
          pendingIndexes.map((index) => elements[index].text),
          options,
        )
      : [];
  const resultByIndex = new Map<number, ClassificationResult>();
  pendingIndexes.forEach((elementIndex, resultIndex) => {
    resultByIndex.set(elementIndex, results[resultIndex]);
  });

  let fallbackCount = 0;
  const classified = elements.map((element, index): ClassifiedElement => {
    if (element.level !== undefined) {
      return { ...element, level: element.level };
    }
    if (element.kind === "table_cell") {
      return { ...element, isHeading: false, level: DEFAULT_HEADING_LEVEL };
    }

    const result = resultByIndex.get(index);
    if (result?.source === "fallback") {
      fallbackCount++;
    }
    if (element.isHeading || element.kind === "heading") {
      return {
        ...element,
        isHeading: true,
        level: result?.isHeading ? result.level : DEFAULT_HEADING_LEVEL,
      };
    }
    return {
      ...element,
      isHeading: result?.isHeading ?? false,
      level: result?.level ?? DEFAULT_HEADING_LEVEL,
    };
  });

  logger.debug(
    `Classified ${pendingIndexes.length} of ${elements.length} elements (${fallbackCount} by fallback)`,
  );
  return { elements: classified, fallbackCount };
}
