/**
 * English inflection for Kubernetes kind names.
 *
 * Resource collection names are derived from the singular kind, so the rules
 * here decide the path segment every request is routed to. Descriptors only
 * depend on the {@link Inflector} interface; callers with a resource whose
 * plural the English rules get wrong can pass their own.
 */

export interface Inflector {
  /**
   * Plural form of a lowercase singular word
   */
  pluralize(word: string): string;

  /**
   * Whether the word is a PascalCase identifier (no separators)
   */
  isPascalCase(word: string): boolean;
}

const UNCOUNTABLE = new Set([
  'deer',
  'equipment',
  'fish',
  'information',
  'money',
  'news',
  'police',
  'rice',
  'series',
  'sheep',
  'species',
]);

const IRREGULAR: Readonly<Record<string, string>> = {
  child: 'children',
  foot: 'feet',
  goose: 'geese',
  man: 'men',
  mouse: 'mice',
  ox: 'oxen',
  person: 'people',
  quiz: 'quizzes',
  tooth: 'teeth',
  woman: 'women',
};

// First match wins.
const PLURAL_RULES: ReadonlyArray<readonly [RegExp, string]> = [
  [/(matr|vert|ind)(?:ix|ex)$/, '$1ices'],
  [/(buffal|tomat|potat|her|ech)o$/, '$1oes'],
  [/(ax|test)is$/, '$1es'],
  [/([^s])sis$/, '$1ses'],
  [/(ss|sh|ch|x|z|us|as)$/, '$1es'],
  [/s$/, 's'],
  [/([^aeiouy]|qu)y$/, '$1ies'],
  [/([^f])fe$/, '$1ves'],
  [/([lr])f$/, '$1ves'],
];

const PASCAL_CASE = /^[A-Z][A-Za-z0-9]*$/;

/**
 * Pluralize a lowercase English word.
 *
 * @example
 * pluralize('policy') // 'policies'
 * pluralize('box')    // 'boxes'
 * pluralize('foo')    // 'foos'
 */
export function pluralize(word: string): string {
  if (word === '' || UNCOUNTABLE.has(word)) {
    return word;
  }

  const irregular = IRREGULAR[word];
  if (irregular !== undefined) {
    return irregular;
  }

  for (const [pattern, replacement] of PLURAL_RULES) {
    if (pattern.test(word)) {
      return word.replace(pattern, replacement);
    }
  }

  return `${word}s`;
}

export function isPascalCase(word: string): boolean {
  return PASCAL_CASE.test(word);
}

export const englishInflector: Inflector = {
  pluralize,
  isPascalCase,
};
