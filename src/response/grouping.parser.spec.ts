import { SolrDecodeError } from '../common/errors/solr.error';
import { flattenGrouping, parseDocList, parseGrouping } from './grouping.parser';
import { JsonRecord } from './utils/json-value';

const identity = (doc: JsonRecord): JsonRecord => doc;

describe('grouping parser', () => {
  describe('parseDocList', () => {
    it('should read counts and decode every document', () => {
      const raw = { numFound: '2', start: 0, docs: [{ id: 'a' }, { id: 'b' }] };

      const list = parseDocList(raw, doc => doc.id, 'response');

      expect(list).toEqual({ numFound: 2, start: 0, docs: ['a', 'b'] });
    });

    it('should reject a doc list without a start offset', () => {
      expect(() => parseDocList({ numFound: 1, docs: [{ id: 'a' }] }, identity, 'response')).toThrow(
        new SolrDecodeError('response.start is missing or not a number'),
      );
    });

    it('should reject documents that are not objects', () => {
      expect(() => parseDocList({ numFound: 1, start: 0, docs: ['a'] }, identity, 'response')).toThrow(
        new SolrDecodeError('response.docs[0] is not an object'),
      );
    });
  });

  it('should read field groups and flatten them in order', () => {
    const grouping = parseGrouping(
      {
        brand: {
          matches: 5,
          ngroups: 2,
          groups: [
            { groupValue: 'acme', doclist: { numFound: 3, start: 0, docs: [{ id: '1' }] } },
            { groupValue: null, doclist: { numFound: 2, start: 0, docs: [{ id: '2' }] } },
          ],
        },
      },
      identity,
    );

    expect(grouping.brand).toEqual({
      matches: 5,
      ngroups: 2,
      groups: [
        { groupValue: 'acme', numFound: 3, start: 0, docs: [{ id: '1' }] },
        { groupValue: null, numFound: 2, start: 0, docs: [{ id: '2' }] },
      ],
      doclist: null,
    });
    expect(flattenGrouping(grouping)).toEqual({ numFound: 5, docs: [{ id: '1' }, { id: '2' }] });
  });

  it('should read a query command with a single doclist', () => {
    const grouping = parseGrouping(
      {
        'price:[0 TO 10]': { matches: 4, doclist: { numFound: 4, start: 0, docs: [{ id: '9' }] } },
      },
      identity,
    );

    expect(grouping['price:[0 TO 10]'].doclist).toEqual({
      numFound: 4,
      start: 0,
      docs: [{ id: '9' }],
    });
    expect(flattenGrouping(grouping)).toEqual({ numFound: 4, docs: [{ id: '9' }] });
  });

  it('should reject a group command without a numeric matches count', () => {
    expect(() => parseGrouping({ brand: { matches: null, groups: [] } }, identity)).toThrow(
      new SolrDecodeError('grouped.brand.matches is missing or not a number'),
    );
  });

  it('should reject a grouped section that is not an object', () => {
    expect(() => parseGrouping([], identity)).toThrow(SolrDecodeError);
  });
});
