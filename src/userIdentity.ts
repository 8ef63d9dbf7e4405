import { InvalidRequestError } from './errors.js';

export const MAX_USER_ID_LENGTH = 255;

// C0/C1 control characters, DEL, and the Unicode line/paragraph separators.
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f\u2028\u2029]/;

export function normalizeUserId(raw: string): string {
  const value = raw.trim();
  if (!value) {
    throw new InvalidRequestError('user_id is required');
  }
  if (value.length > MAX_USER_ID_LENGTH) {
    throw new InvalidRequestError(`user_id must be at most ${MAX_USER_ID_LENGTH} characters`);
  }
  if (CONTROL_CHARACTERS.test(value)) {
    throw new InvalidRequestError('user_id contains control characters');
  }
  return value;
}

