/**
 * Error returned by (or while reading the answer of) the Solr server.
 */
export class SolrError extends Error {
  /**
   * HTTP status of the response, absent when no response was received
   */
  readonly statusCode?: number;

  /**
   * Parsed error payload, or the raw body when it was not valid JSON
   */
  readonly response?: unknown;

  constructor(message: string, statusCode?: number, response?: unknown) {
    super(message);
    this.name = 'SolrError';
    this.statusCode = statusCode;
    this.response = response;
    Object.setPrototypeOf(this, SolrError.prototype);
  }
}

/**
 * The response arrived but its content does not match the expected envelope
 * or a document failed validation against the requested document class.
 */
export class SolrDecodeError extends SolrError {
  readonly violations: string[];

  constructor(message: string, statusCode?: number, response?: unknown, violations: string[] = []) {
    super(message, statusCode, response);
    this.name = 'SolrDecodeError';
    this.violations = violations;
    Object.setPrototypeOf(this, SolrDecodeError.prototype);
  }
}
