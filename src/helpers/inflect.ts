/**
 * Inflection helpers
 *
 * Simple English rules, enough for resource collection names:
 * - category <-> categories
 * - box <-> boxes, match <-> matches, class <-> classes
 * - book <-> books
 */

const VOWEL_Y = ['ay', 'ey', 'oy', 'uy']

/**
 * Pluralize a word (simple rules)
 */
export function pluralize(word: string): string {
  if (word.endsWith('y') && !VOWEL_Y.some((s) => word.endsWith(s))) {
    return word.slice(0, -1) + 'ies'
  }
  if (word.endsWith('s') || word.endsWith('x') || word.endsWith('ch') || word.endsWith('sh')) {
    return word + 'es'
  }
  return word + 's'
}

/**
 * Singularize a word, the inverse of `pluralize` for the forms it produces.
 * Words that do not look plural are returned unchanged.
 */
export function singularize(word: string): string {
  if (word.endsWith('ies') && word.length > 3) {
    return word.slice(0, -3) + 'y'
  }
  if (/(ss|x|ch|sh)es$/.test(word)) {
    return word.slice(0, -2)
  }
  if (word.endsWith('s') && !/(ss|us|is)$/.test(word)) {
    return word.slice(0, -1)
  }
  return word
}

/**
 * Whether `word` is in plural form, i.e. singularizing changes it.
 */
export function isPlural(word: string): boolean {
  return singularize(word) !== word
}
