/** Lowercase German alphabet the street prefixes grow over. */
export const GERMAN_ALPHABET = 'abcdefghijklmnopqrstuvwxyzäöüß';

/** First letters the street search starts from. */
export const STREET_SEED_LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZÄÖÜ';

export const DIGIT_SYMBOLS = '0123456789';

/** The service answers nothing for an empty house-number prefix. */
export const HOUSE_NUMBER_SEEDS = '123456789';

export function digitSymbols(): readonly string[] {
  return [...DIGIT_SYMBOLS];
}
