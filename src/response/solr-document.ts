import { ClassConstructor, instanceToPlain, plainToInstance } from 'class-transformer';
import { IsOptional, getMetadataStorage, validateSync } from 'class-validator';
import { SolrDecodeError } from '../common/errors/solr.error';
import { IsStringOrNumber } from '../common/validation/decorators';
import { formatViolations } from '../common/validation/validate-model';
import { JsonRecord, isRecord, setEntry } from './utils/json-value';

/**
 * Base class for typed result documents. Subclasses declare their stored
 * fields with class-validator decorators; fields they do not declare are
 * kept in {@link SolrDocument.additionalFields}.
 *
 * @example
 * class Product extends SolrDocument {
 *   @IsString()
 *   name!: string;
 *
 *   @IsOptional()
 *   @IsNumber()
 *   price?: number;
 * }
 */
export class SolrDocument {
  @IsOptional()
  @IsStringOrNumber()
  id?: string | number;

  additionalFields: Record<string, unknown> = {};
}

export type DocumentShape<T extends SolrDocument> = ClassConstructor<T>;

const EXTRA_KEY = 'additionalFields';

/**
 * Property names a document class declares through validation decorators,
 * inherited ones included
 */
export function declaredFields(shape: DocumentShape<SolrDocument>): Set<string> {
  const metadata = getMetadataStorage().getTargetValidationMetadatas(shape, '', true, false);
  const fields = new Set(metadata.map(entry => entry.propertyName));
  fields.delete(EXTRA_KEY);
  return fields;
}

/**
 * Validate one raw document against `shape` and convert it
 */
export function decodeDocument<T extends SolrDocument>(shape: DocumentShape<T>, raw: unknown): T {
  if (!isRecord(raw)) {
    throw new SolrDecodeError(`Expected a document object for ${shape.name}`, undefined, raw);
  }

  const fields = declaredFields(shape);
  const declared: JsonRecord = {};
  const additional: JsonRecord = {};
  for (const [key, value] of Object.entries(raw)) {
    setEntry(fields.has(key) ? declared : additional, key, value);
  }

  const document = plainToInstance(shape, declared);
  document.additionalFields = additional;

  const violations = formatViolations(validateSync(document));
  if (violations.length > 0) {
    throw new SolrDecodeError(
      `Document does not match ${shape.name}`,
      undefined,
      raw,
      violations,
    );
  }

  return document;
}

/**
 * Plain object for indexing: declared fields followed by the additional ones
 */
export function serializeDocument(document: SolrDocument | JsonRecord): JsonRecord {
  if (!(document instanceof SolrDocument)) {
    return { ...document };
  }

  const { [EXTRA_KEY]: additional, ...declared } = instanceToPlain(document);
  return { ...declared, ...(isRecord(additional) ? additional : {}) };
}
