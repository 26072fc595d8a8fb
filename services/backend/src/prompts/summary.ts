const STRUCTURED_INSTRUCTIONS = [
  'Summary: [Write a single, concise paragraph summarizing the main research question, methodology, findings, and implications. Do not include any section headers, meta-comments, or repeated information.]',
  "Key Highlights: [After the summary, write exactly one section titled 'Key Highlights:' on a new line, followed by 2-4 bullet points. Each bullet should begin with a bolded label (e.g., **Novelty:**, **Findings:**, **Implication:**) and be concise, non-redundant, and directly related to the main contributions or results.]",
  "Do not repeat information between the summary and highlights. Do not continue writing after the highlights section. Do not include any XML, HTML, or markdown other than bold for the highlight labels. Only output the summary and the 'Key Highlights:' section, nothing else.",
].join('\n');

export const createSummaryPrompt = (text: string): string =>
  `Write ONLY the following two sections for the text below:\n${STRUCTURED_INSTRUCTIONS}\n\n${text}`;

export const createCombiningSummaryPrompt = (partialSummaries: string): string =>
  `Write ONLY the following two sections for the text below (which is a set of summaries of a research paper):\n${STRUCTURED_INSTRUCTIONS}\n\n${partialSummaries}`;

export const createChunkSummaryPrompt = (chunk: string, index: number, total: number): string =>
  `Summarize the following part of a research paper (part ${index + 1} of ${total}):\n\n${chunk}`;
