import { SolrDecodeError } from '../common/errors/solr.error';
import {
  DocList,
  GroupCommandResult,
  GroupingResult,
  ResultGroup,
} from './interfaces/search-result.interface';
import { JsonRecord, isRecord, readCount, setEntry } from './utils/json-value';

export type DocumentDecoder<T> = (raw: JsonRecord) => T;

function requireCount(raw: JsonRecord, key: string, where: string): number {
  const count = readCount(raw[key]);
  if (count === null) {
    throw new SolrDecodeError(`${where}.${key} is missing or not a number`, undefined, raw);
  }
  return count;
}

/**
 * `{ numFound, start, docs }` with every document decoded
 */
export function parseDocList<T>(raw: unknown, decode: DocumentDecoder<T>, where: string): DocList<T> {
  if (!isRecord(raw)) {
    throw new SolrDecodeError(`${where} is not a document list`, undefined, raw);
  }

  const docs = raw.docs ?? [];
  if (!Array.isArray(docs)) {
    throw new SolrDecodeError(`${where}.docs is not a list`, undefined, raw);
  }

  return {
    numFound: requireCount(raw, 'numFound', where),
    start: requireCount(raw, 'start', where),
    docs: docs.map((doc: unknown, index) => {
      if (!isRecord(doc)) {
        throw new SolrDecodeError(`${where}.docs[${index}] is not an object`, undefined, raw);
      }
      return decode(doc);
    }),
  };
}

/**
 * Decode the `grouped` section. Field and function commands carry `groups`,
 * query commands and `group.format=simple` carry a single `doclist`.
 */
export function parseGrouping<T>(raw: unknown, decode: DocumentDecoder<T>): GroupingResult<T> {
  if (!isRecord(raw)) {
    throw new SolrDecodeError('grouped is not an object', undefined, raw);
  }

  const grouping: GroupingResult<T> = {};

  for (const [name, command] of Object.entries(raw)) {
    if (!isRecord(command)) {
      throw new SolrDecodeError(`grouped.${name} is not an object`, undefined, raw);
    }

    const groups: ResultGroup<T>[] = [];
    if (Array.isArray(command.groups)) {
      command.groups.forEach((group: unknown, index: number) => {
        const where = `grouped.${name}.groups[${index}]`;
        if (!isRecord(group)) {
          throw new SolrDecodeError(`${where} is not an object`, undefined, raw);
        }
        groups.push({
          groupValue: group.groupValue ?? null,
          ...parseDocList(group.doclist, decode, `${where}.doclist`),
        });
      });
    }

    const result: GroupCommandResult<T> = {
      matches: requireCount(command, 'matches', `grouped.${name}`),
      ngroups: 'ngroups' in command ? requireCount(command, 'ngroups', `grouped.${name}`) : null,
      groups,
      doclist:
        command.doclist === undefined
          ? null
          : parseDocList(command.doclist, decode, `grouped.${name}.doclist`),
    };
    setEntry(grouping, name, result);
  }

  return grouping;
}

/**
 * Every grouped document, in command then group order, with the summed
 * `numFound` of the lists they came from
 */
export function flattenGrouping<T>(grouping: GroupingResult<T>): { numFound: number; docs: T[] } {
  let numFound = 0;
  const docs: T[] = [];

  for (const command of Object.values(grouping)) {
    const lists = command.doclist === null ? command.groups : [...command.groups, command.doclist];
    for (const list of lists) {
      numFound += list.numFound;
      docs.push(...list.docs);
    }
  }

  return { numFound, docs };
}
