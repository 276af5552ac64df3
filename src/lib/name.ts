import { InvalidNameError } from './errors.js';
import { SESSION_SEPARATOR } from './paths.js';

export const MAX_NAME_LENGTH = 50;

// Path separators, the session separator, and characters git refuses in branch names.
const FORBIDDEN_CHARS = new RegExp(`[/\\\\:${SESSION_SEPARATOR}\\s~^?*\\[\\]\\x00-\\x1f\\x7f]`);

/**
 * Validate a crew or work item name. Fails closed: invalid names are
 * rejected, never rewritten.
 */
export function validateName(name: string, label: string = 'crew name'): void {
  if (name === '') {
    throw new InvalidNameError(`${label} cannot be empty`);
  }

  if (FORBIDDEN_CHARS.test(name)) {
    throw new InvalidNameError(
      `${label} cannot contain special characters (/, \\, :, ${SESSION_SEPARATOR}, whitespace): ${name}`,
    );
  }

  if (/^[.-]/.test(name)) {
    throw new InvalidNameError(`${label} cannot start with . or -: ${name}`);
  }

  if (name.includes('..') || name.endsWith('.lock')) {
    throw new InvalidNameError(`${label} is not a valid git branch component: ${name}`);
  }

  if (name.length > MAX_NAME_LENGTH) {
    throw new InvalidNameError(`${label} too long (max ${MAX_NAME_LENGTH} chars): ${name}`);
  }
}
