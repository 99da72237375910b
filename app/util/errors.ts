/* eslint-disable max-classes-per-file */ // This file creates multiple tag classes

/**
 * Base class for errors raised while reading or writing STAC records
 */
export class StacError extends Error {
  code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = this.constructor.name;
  }
}

/**
 * Raised when input is not JSON or does not have the shape of the expected record.
 * `path` is the JSON pointer of the offending value ('' for the document itself).
 */
export class ParseError extends StacError {
  path: string;

  constructor(message: string, path = '') {
    super('stac.ParseError', message);
    this.path = path;
  }
}

// Raised when asked to write a record that could not be read back
export class SerializationError extends StacError {
  path: string;

  constructor(message: string, path = '') {
    super('stac.SerializationError', message);
    this.path = path;
  }
}
