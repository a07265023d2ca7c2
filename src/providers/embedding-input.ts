import { InvalidInputError } from '../errors.js';

/** Zero-content text has no meaningful embedding; refuse it up front. */
export function assertEmbeddable(text: string, field = 'text'): void {
  if (typeof text !== 'string' || text.trim().length === 0) {
    throw new InvalidInputError(`${field} must not be empty`);
  }
}

export function assertEmbeddableBatch(texts: string[]): void {
  texts.forEach((text, i) => assertEmbeddable(text, `texts[${i}]`));
}
