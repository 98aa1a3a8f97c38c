import { IsString } from 'class-validator';
import { SolrDecodeError, SolrError } from '../common/errors/solr.error';
import { decodeEnvelope, decodeSearchResponse, solrErrorMessage } from './response-decoder';
import { SolrDocument } from './solr-document';

class Product extends SolrDocument {
  @IsString()
  name!: string;
}

function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('response decoder', () => {
  it('should decode a plain search response', () => {
    const result = decodeSearchResponse({
      status: 200,
      data: { response: { numFound: 2, start: 0, docs: [{ id: '1' }, { id: '2' }] } },
    });

    expect(result.numFound).toBe(2);
    expect(result.start).toBe(0);
    expect(result.docs).toEqual([{ id: '1' }, { id: '2' }]);
    expect(result.facetCounts).toBeNull();
    expect(result.facets).toBeNull();
    expect(result.highlighting).toBeNull();
    expect(result.grouping).toBeNull();
    expect(result.moreLikeThis).toBeNull();
    expect(result.status).toBe(0);
    expect(result.queryTime).toBe(0);
  });

  it('should read the response header and scoring fields', () => {
    const result = decodeSearchResponse({
      status: 200,
      data: JSON.stringify({
        responseHeader: { status: 0, QTime: 7 },
        response: { numFound: 1, start: 0, numFoundExact: true, maxScore: 1.25, docs: [{ id: 'a' }] },
      }),
    });

    expect(result.queryTime).toBe(7);
    expect(result.numFoundExact).toBe(true);
    expect(result.maxScore).toBe(1.25);
  });

  it('should raise the Solr error message with the HTTP status', () => {
    const error = catchError(() =>
      decodeSearchResponse({ status: 400, data: { error: { msg: 'undefined field foo', code: 400 } } }),
    );

    expect(error).toBeInstanceOf(SolrError);
    expect(error instanceof SolrError && error.message).toBe('undefined field foo');
    expect(error instanceof SolrError && error.statusCode).toBe(400);
  });

  it('should keep a non-JSON error body', () => {
    const error = catchError(() => decodeEnvelope({ status: 502, data: 'Bad Gateway' }));

    expect(error instanceof SolrError && error.message).toBe('Solr request failed with status 502');
    expect(error instanceof SolrError && error.response).toBe('Bad Gateway');
  });

  it('should reject a successful response that is not JSON', () => {
    const error = catchError(() => decodeEnvelope({ status: 200, data: '<html>' }));

    expect(error).toBeInstanceOf(SolrError);
    expect(error instanceof SolrError && error.statusCode).toBe(200);
  });

  it('should reject a JSON body that is not an object', () => {
    expect(() => decodeEnvelope({ status: 200, data: [1, 2] })).toThrow(SolrDecodeError);
  });

  it('should read the Solr error message', () => {
    expect(solrErrorMessage({ error: { msg: 'boom' } })).toBe('boom');
    expect(solrErrorMessage({ error: 'boom' })).toBeUndefined();
  });

  it('should decode highlighting snippets', () => {
    const result = decodeSearchResponse({
      status: 200,
      data: {
        response: { numFound: 1, start: 0, docs: [{ id: '1' }] },
        highlighting: { '1': { title: ['<em>mouse</em> pad'] } },
      },
    });

    expect(result.highlighting).toEqual({ '1': { title: ['<em>mouse</em> pad'] } });
  });

  it('should reject malformed highlighting with the HTTP status', () => {
    const error = catchError(() =>
      decodeSearchResponse({
        status: 200,
        data: { response: { numFound: 0, start: 0, docs: [] }, highlighting: { '1': { title: 'x' } } },
      }),
    );

    expect(error).toBeInstanceOf(SolrDecodeError);
    expect(error instanceof SolrDecodeError && error.message).toBe(
      'highlighting.1.title is not a list of strings',
    );
    expect(error instanceof SolrDecodeError && error.statusCode).toBe(200);
  });

  it('should reject a non-numeric numFound with the HTTP status', () => {
    const error = catchError(() =>
      decodeSearchResponse({
        status: 200,
        data: { response: { numFound: 'lots', start: 0, docs: [{ id: '1' }] } },
      }),
    );

    expect(error).toBeInstanceOf(SolrDecodeError);
    expect(error instanceof SolrDecodeError && error.message).toBe(
      'response.numFound is missing or not a number',
    );
    expect(error instanceof SolrDecodeError && error.statusCode).toBe(200);
  });

  it('should flatten grouped responses', () => {
    const result = decodeSearchResponse({
      status: 200,
      data: {
        grouped: {
          brand: {
            matches: 5,
            groups: [
              { groupValue: 'acme', doclist: { numFound: 3, start: 0, docs: [{ id: '1' }] } },
              { groupValue: 'globex', doclist: { numFound: 2, start: 0, docs: [{ id: '2' }] } },
            ],
          },
        },
      },
    });

    expect(result.numFound).toBe(5);
    expect(result.docs).toEqual([{ id: '1' }, { id: '2' }]);
    expect(result.grouping?.brand.matches).toBe(5);
    expect(result.grouping?.brand.ngroups).toBeNull();
    expect(result.grouping?.brand.groups).toHaveLength(2);
  });

  it('should read MoreLikeThis lists in map and flat form', () => {
    const list = { numFound: 1, start: 0, docs: [{ id: '3' }] };
    const expected = {
      '1': { numFound: 1, start: 0, docs: [{ id: '3' }], numFoundExact: null, interestingTerms: null },
    };

    const fromMap = decodeSearchResponse({ status: 200, data: { moreLikeThis: { '1': list } } });
    const fromFlat = decodeSearchResponse({ status: 200, data: { moreLikeThis: ['1', list] } });

    expect(fromMap.moreLikeThis).toEqual(expected);
    expect(fromFlat.moreLikeThis).toEqual(expected);
  });

  it('should decode documents into the requested class', () => {
    const result = decodeSearchResponse(
      {
        status: 200,
        data: { response: { numFound: 1, start: 0, docs: [{ id: '1', name: 'Mouse', color: 'red' }] } },
      },
      Product,
    );

    expect(result.docs[0]).toBeInstanceOf(Product);
    expect(result.docs[0].name).toBe('Mouse');
    expect(result.docs[0].additionalFields).toEqual({ color: 'red' });
  });

  it('should attach the HTTP status to a document mismatch', () => {
    const error = catchError(() =>
      decodeSearchResponse(
        { status: 200, data: { response: { numFound: 1, start: 0, docs: [{ id: '1' }] } } },
        Product,
      ),
    );

    expect(error instanceof SolrDecodeError && error.violations).toEqual([
      'name: name must be a string',
    ]);
    expect(error instanceof SolrDecodeError && error.statusCode).toBe(200);
  });
});
