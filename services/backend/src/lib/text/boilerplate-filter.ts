export interface LineRule {
  id: string;
  test: (line: string) => boolean;
}

export interface CleanLinesResult {
  lines: string[];
  removedFragments: string[];
}

const META_COMMENT_PREFIXES: string[] = [
  'the summary should',
  'no, start with',
  'here is a possible',
  'please provide',
  'i apologize',
  'this is not',
  'waiting for your text',
  'now create',
  'only output',
  'summarize the following',
  'do not include',
  'output the summary',
  'output only',
  'in summary:',
  'rewritten response is:',
  'rest of the original text remains the same',
];

const TAG_PATTERN = /<.*?>/g;

export const prefixRule = (id: string, prefix: string): LineRule => {
  const lowered = prefix.toLowerCase();
  return {
    id,
    test: (line) => line.toLowerCase().startsWith(lowered),
  };
};

/**
 * Ordered line rules applied to trimmed, non-empty lines of model output.
 * The first matching rule removes the line.
 */
export const DEFAULT_LINE_RULES: readonly LineRule[] = [
  ...META_COMMENT_PREFIXES.map((prefix) => prefixRule(`meta:${prefix}`, prefix)),
  prefixRule('code-fence', '```'),
  prefixRule('separator', '---'),
];

export const stripTags = (input: string): string => input.replace(TAG_PATTERN, '');

export const findMatchingRule = (
  line: string,
  rules: readonly LineRule[] = DEFAULT_LINE_RULES
): LineRule | undefined => rules.find((rule) => rule.test(line));

export const isBoilerplateLine = (
  line: string,
  rules: readonly LineRule[] = DEFAULT_LINE_RULES
): boolean => findMatchingRule(line, rules) !== undefined;

export const cleanLines = (
  input: string,
  rules: readonly LineRule[] = DEFAULT_LINE_RULES
): CleanLinesResult => {
  const lines: string[] = [];
  const removedFragments: string[] = [];

  for (const rawLine of input.replace(/\r\n/g, '\n').split('\n')) {
    const trimmed = rawLine.trim();
    if (!trimmed) {
      continue;
    }

    if (isBoilerplateLine(trimmed, rules)) {
      removedFragments.push(trimmed);
      continue;
    }

    lines.push(trimmed);
  }

  return { lines, removedFragments };
};
