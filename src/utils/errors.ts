/**
 * An expected failure reported to the user, such as a missing file or an
 * invalid config, rather than a program bug. The CLI prints only its message.
 */
export class HandledError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandledError';
    // Ensure the prototype chain is correctly set up for instanceof checks
    Object.setPrototypeOf(this, HandledError.prototype);
  }
}
