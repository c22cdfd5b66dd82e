/**
 * Thoroughly removes all types of whitespace characters from both ends of a string.
 * Handles spaces, tabs, line breaks, and carriage returns.
 */
export const fullTrim = (str: string): string => {
  return str.replace(/^[\s\r\n\t]+|[\s\r\n\t]+$/g, "");
};

/**
 * Replaces every run of whitespace (including line breaks) with a single space.
 */
export const collapseWhitespace = (str: string): string => {
  return str.replace(/\s+/g, " ");
};

/**
 * Length in code points, so a CJK character or an emoji counts once.
 */
export const codePointLength = (str: string): number => {
  let length = 0;
  for (const _ of str) length++;
  return length;
};
