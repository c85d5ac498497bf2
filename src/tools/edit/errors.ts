/**
 * Edit engine errors.
 *
 * Pattern and verification failures are reported as outcomes, never thrown.
 * This error covers misuse of the engine by its caller.
 *
 * @module edit/errors
 */

export class EditEngineError extends Error {
  constructor(
    message: string,
    public readonly code: EditEngineErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EditEngineError';
    Error.captureStackTrace?.(this, EditEngineError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export enum EditEngineErrorCode {
  INVALID_DOCUMENT = 'INVALID_DOCUMENT',
  INVALID_EDITS = 'INVALID_EDITS',
  INVALID_SPAN = 'INVALID_SPAN',
  SESSION_CONSUMED = 'SESSION_CONSUMED',
}
