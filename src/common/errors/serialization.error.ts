/**
 * A value could not be written in the wire form declared for its key.
 * Models validate on construction, so reaching this is an internal bug.
 */
export class SerializationError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Cannot serialize parameter '${key}': ${message}`);
    this.name = 'SerializationError';
    this.key = key;
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}
