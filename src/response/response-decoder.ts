import { SolrDecodeError, SolrError } from '../common/errors/solr.error';
import { parseFacetResult } from './facet-result.parser';
import { DocumentDecoder, flattenGrouping, parseDocList, parseGrouping } from './grouping.parser';
import {
  Highlighting,
  MoreLikeThisMatch,
  MoreLikeThisResult,
  SearchResult,
  SolrRawResponse,
  SolrRecord,
} from './interfaces/search-result.interface';
import { DocumentShape, SolrDocument, decodeDocument } from './solr-document';
import { JsonRecord, coerceInt, isRecord, optionalNumber, setEntry } from './utils/json-value';

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function parseBody(raw: SolrRawResponse): unknown {
  if (typeof raw.data !== 'string') {
    return raw.data;
  }
  try {
    return JSON.parse(raw.data);
  } catch (error) {
    if (!isSuccess(raw.status)) {
      return raw.data;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new SolrError(`Solr returned a body that is not valid JSON: ${reason}`, raw.status, raw.data);
  }
}

/**
 * `error.msg` of a Solr error body, when there is one
 */
export function solrErrorMessage(body: unknown): string | undefined {
  if (isRecord(body) && isRecord(body.error) && typeof body.error.msg === 'string') {
    return body.error.msg;
  }
  return undefined;
}

/**
 * Parse a response body and reject any non-2xx status
 */
export function decodeEnvelope(raw: SolrRawResponse): JsonRecord {
  const body = parseBody(raw);

  if (!isSuccess(raw.status)) {
    throw new SolrError(
      solrErrorMessage(body) ?? `Solr request failed with status ${raw.status}`,
      raw.status,
      body,
    );
  }

  if (!isRecord(body)) {
    throw new SolrDecodeError('Solr response is not a JSON object', raw.status, body);
  }

  return body;
}

function parseHighlighting(raw: unknown): Highlighting {
  if (!isRecord(raw)) {
    throw new SolrDecodeError('highlighting is not an object', undefined, raw);
  }

  const highlighting: Highlighting = {};
  for (const [docId, fields] of Object.entries(raw)) {
    if (!isRecord(fields)) {
      throw new SolrDecodeError(`highlighting.${docId} is not an object`, undefined, raw);
    }

    const snippets: Record<string, string[]> = {};
    for (const [field, fragments] of Object.entries(fields)) {
      if (!Array.isArray(fragments) || !fragments.every(item => typeof item === 'string')) {
        throw new SolrDecodeError(
          `highlighting.${docId}.${field} is not a list of strings`,
          undefined,
          raw,
        );
      }
      setEntry(snippets, field, fragments);
    }
    setEntry(highlighting, docId, snippets);
  }

  return highlighting;
}

/**
 * `moreLikeThis` arrives as a map (`{ id: docList }`) or, under the default
 * `json.nl=flat`, as `[id, docList, id, docList]`
 */
function parseMoreLikeThis<T>(raw: unknown, decode: DocumentDecoder<T>): MoreLikeThisResult<T> {
  let entries: Array<[string, unknown]>;
  if (isRecord(raw)) {
    entries = Object.entries(raw);
  } else if (Array.isArray(raw)) {
    entries = [];
    for (let index = 0; index < raw.length; index += 2) {
      entries.push([String(raw[index]), raw[index + 1]]);
    }
  } else {
    throw new SolrDecodeError('moreLikeThis is not an object', undefined, raw);
  }

  const result: MoreLikeThisResult<T> = {};
  for (const [docId, list] of entries) {
    const exact: unknown = isRecord(list) ? list.numFoundExact : undefined;
    setEntry<MoreLikeThisMatch<T>>(result, docId, {
      ...parseDocList(list, decode, `moreLikeThis.${docId}`),
      numFoundExact: typeof exact === 'boolean' ? exact : null,
      interestingTerms: isRecord(list) ? list.interestingTerms ?? null : null,
    });
  }
  return result;
}

function decodeWith<T>(raw: SolrRawResponse, decode: DocumentDecoder<T>): SearchResult<T> {
  const payload = decodeEnvelope(raw);

  try {
    const header: JsonRecord = isRecord(payload.responseHeader) ? payload.responseHeader : {};
    const status = typeof header.status === 'number' ? header.status : payload.status;

    const result: SearchResult<T> = {
      status: typeof status === 'number' ? status : 0,
      queryTime: coerceInt(header.QTime),
      numFound: 0,
      start: 0,
      numFoundExact: null,
      maxScore: null,
      docs: [],
      facetCounts: isRecord(payload.facet_counts) ? payload.facet_counts : null,
      facets: parseFacetResult(payload),
      highlighting: payload.highlighting === undefined ? null : parseHighlighting(payload.highlighting),
      grouping: null,
      moreLikeThis:
        payload.moreLikeThis === undefined ? null : parseMoreLikeThis(payload.moreLikeThis, decode),
      raw: payload,
    };

    if (payload.response !== undefined) {
      const list = parseDocList(payload.response, decode, 'response');
      const response: JsonRecord = isRecord(payload.response) ? payload.response : {};
      result.numFound = list.numFound;
      result.start = list.start;
      result.docs = list.docs;
      result.numFoundExact =
        typeof response.numFoundExact === 'boolean' ? response.numFoundExact : null;
      result.maxScore = optionalNumber(response.maxScore);
    } else if (payload.grouped !== undefined) {
      const grouping = parseGrouping(payload.grouped, decode);
      const flat = flattenGrouping(grouping);
      result.grouping = grouping;
      result.numFound = flat.numFound;
      result.docs = flat.docs;
    }

    return result;
  } catch (error) {
    if (error instanceof SolrDecodeError && error.statusCode === undefined) {
      throw new SolrDecodeError(error.message, raw.status, error.response, error.violations);
    }
    throw error;
  }
}

/**
 * Turn a raw Solr search response into a {@link SearchResult}.
 *
 * Without a document shape the documents are returned as plain objects.
 * With one, every document (grouped and MoreLikeThis ones included) is
 * validated and converted; a mismatch raises a {@link SolrDecodeError}.
 */
export function decodeSearchResponse(raw: SolrRawResponse): SearchResult<SolrRecord>;
export function decodeSearchResponse<T extends SolrDocument>(
  raw: SolrRawResponse,
  documentShape: DocumentShape<T>,
): SearchResult<T>;
export function decodeSearchResponse<T extends SolrDocument>(
  raw: SolrRawResponse,
  documentShape?: DocumentShape<T>,
): SearchResult<T> | SearchResult<SolrRecord> {
  if (documentShape === undefined) {
    return decodeWith<SolrRecord>(raw, doc => doc);
  }
  return decodeWith(raw, doc => decodeDocument(documentShape, doc));
}
