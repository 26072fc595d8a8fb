const WHITESPACE_RUN = /\s+/g;

export const ELLIPSIS = '...';

/** Collapses whitespace and truncates to `maxLength` characters, appending an ellipsis. */
export const formatModelOutput = (output: string, maxLength?: number): string => {
  const collapsed = output.replace(WHITESPACE_RUN, ' ').trim();
  if (maxLength !== undefined && maxLength > 0 && collapsed.length > maxLength) {
    return `${collapsed.slice(0, maxLength)}${ELLIPSIS}`;
  }
  return collapsed;
};

export const previewText = (text: string, length = 100): string =>
  text.length > length ? `${text.slice(0, length)}${ELLIPSIS}` : text;
