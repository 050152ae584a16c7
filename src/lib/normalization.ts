// Answer whitespace: includes the C0 separators and U+0085, excludes U+FEFF.
const MULTI_SPACE_REGEX = /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/g;
const EDGE_SPACE_REGEX =
  /^[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+|[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+$/g;
// Matches the ASCII punctuation set character for character.
const PUNCTUATION_REGEX = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;
const ARTICLE_REGEX = /(?<![\p{L}\p{N}_])(?:a|an|the)(?![\p{L}\p{N}_])/gu;

export const collapseWhitespace = (value: string) => {
  return value.replace(EDGE_SPACE_REGEX, "").replace(MULTI_SPACE_REGEX, " ");
};

/**
 * Canonical form used for text answers: lowercase, punctuation removed,
 * articles removed, whitespace collapsed. Step order is significant since
 * stripping punctuation can fuse words before articles are matched.
 */
export const normalizeAnswerText = (value: string) => {
  const lowered = value.toLowerCase();
  const withoutPunctuation = lowered.replace(PUNCTUATION_REGEX, "");
  const withoutArticles = withoutPunctuation.replace(ARTICLE_REGEX, " ");
  return collapseWhitespace(withoutArticles);
};

export const tokenizeAnswer = (normalizedValue: string): string[] => {
  const collapsed = collapseWhitespace(normalizedValue);
  if (collapsed.length === 0) {
    return [];
  }

  return collapsed.split(" ");
};
