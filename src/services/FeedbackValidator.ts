/**
 * Feedback payload validation.
 * Turns an untrusted, already-parsed body into a trimmed message string.
 */

import { ValidationError } from '../errors.js';

export const DEFAULT_MAX_MESSAGE_LENGTH = 500;

export class FeedbackValidator {
  constructor(readonly maxMessageLength: number = DEFAULT_MAX_MESSAGE_LENGTH) {}

  /**
   * @param raw - parsed JSON body; `undefined` when the body was absent or not JSON
   * @returns the message with surrounding whitespace removed
   * @throws ValidationError with kind `MissingField`, `EmptyMessage` or `TooLong`
   */
  validate(raw: unknown): string {
    if (!isRecord(raw) || !('message' in raw) || raw.message === null) {
      throw new ValidationError('MissingField', 'message is required');
    }

    if (typeof raw.message !== 'string') {
      throw new ValidationError('MissingField', 'message must be a string');
    }

    const message = raw.message.trim();

    if (message.length === 0) {
      throw new ValidationError('EmptyMessage', 'message cannot be empty');
    }

    // Counted in code points, so an emoji is one character
    if (Array.from(message).length > this.maxMessageLength) {
      throw new ValidationError(
        'TooLong',
        `message must be ${this.maxMessageLength} characters or less`
      );
    }

    return message;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
