export class InvoiceError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}\n  ${errors.join('\n  ')}` : message);
    this.name = new.target.name;
    this.errors = errors;
  }
}

/** Missing or invalid settings; raised before anything is rendered. */
export class ConfigError extends InvoiceError {}

/** Bad CLI values, CSV rows or dates. */
export class InputError extends InvoiceError {}

export class RenderError extends InvoiceError {}

export function extractErrorMessage(error: unknown): string {
  if (typeof error === 'string') return error;
  if (error instanceof Error) return error.message;
  if (error && typeof error === 'object' && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') return message;
  }
  return 'Unknown error';
}
