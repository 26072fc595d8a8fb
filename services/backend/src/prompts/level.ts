import type { ReadingLevel } from '../types';

const EXAMPLE_ORIGINAL =
  'Quantum entanglement is a phenomenon where particles become linked and the state of one instantly influences the other, no matter the distance.';

const LEVEL_EXAMPLES: Record<ReadingLevel, { audience: string; rewrite: string }> = {
  Beginner: {
    audience: 'a beginner',
    rewrite:
      "Sometimes, tiny things like particles can be connected so that when something happens to one, the other changes too, even if they're far apart.",
  },
  Intermediate: {
    audience: 'an intermediate reader',
    rewrite:
      'Quantum entanglement means that two particles can be connected in such a way that changing one will instantly affect the other, even if they are far apart.',
  },
  Expert: {
    audience: 'an expert',
    rewrite:
      "Quantum entanglement describes a nonlocal correlation between quantum systems, such that the measurement of one system's state instantaneously determines the state of its entangled partner, regardless of spatial separation.",
  },
};

export const createLevelPrompt = (text: string, level: ReadingLevel): string => {
  const { audience, rewrite } = LEVEL_EXAMPLES[level];
  return [
    `Rewrite the following text for ${audience}. ONLY output the rewritten text. Do NOT include instructions, apologies, or explanations.`,
    '',
    'Example:',
    `Original: ${EXAMPLE_ORIGINAL}`,
    `${level}: ${rewrite}`,
    '',
    `Text: ${text}`,
  ].join('\n');
};

export const createKeyConceptsPrompt = (text: string): string =>
  `Extract the key concepts from this text and explain each one briefly. Write one concept per line as "Concept: explanation".\n\n${text}`;
