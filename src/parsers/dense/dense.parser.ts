import {
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidationArguments,
  ValidationOptions,
  registerDecorator,
} from 'class-validator';
import { IsStringOrStringArray } from '../../common/validation/decorators';
import { CommonParamsOptions } from '../../params/common-params';
import { WireParams } from '../../params/wire-params';
import { QueryParser } from '../query-parser';
import { LocalParamEntry, formatLocalParams, formatVectorPayload } from './local-params';

/**
 * Query vector given explicitly
 */
export interface VectorInput {
  type: 'vector';
  vector: number[];
}

/**
 * Query text, turned into a vector by a model loaded in Solr's
 * text-to-vector model store
 */
export interface TextInput {
  type: 'text';
  text: string;
  model: string;
}

export type VectorSource = VectorInput | TextInput;
export type VectorSourceType = VectorSource['type'];

export interface DenseVectorQueryOptions extends CommonParamsOptions {
  /** DenseVectorField to search */
  field: string;
  source: VectorSource;
  /** Explicit pre-filter queries; replace the implicit `fq` pre-filtering */
  preFilter?: string | string[];
  /** Only `fq` filters with these tags pre-filter */
  includeTags?: string | string[];
  /** `fq` filters with these tags do not pre-filter */
  excludeTags?: string | string[];
}

function isFiniteNumberArray(value: unknown): boolean {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every(item => typeof item === 'number' && Number.isFinite(item))
  );
}

function isNonEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Why `value` is not a usable source for `parser`, or null when it is
 */
function describeSourceProblem(value: unknown, parser: object): string | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return 'source is required: { type: "vector", vector } or { type: "text", text, model }';
  }

  const hasVector = 'vector' in value && value.vector !== undefined;
  const hasText =
    ('text' in value && value.text !== undefined) || ('model' in value && value.model !== undefined);
  if (hasVector && hasText) {
    return 'source takes either a vector or a text and model, not both';
  }

  const type: unknown = 'type' in value ? value.type : undefined;
  if (type === 'vector') {
    if (!('vector' in value) || !isFiniteNumberArray(value.vector)) {
      return 'source.vector must be a non-empty list of finite numbers';
    }
  } else if (type === 'text') {
    if (!('text' in value) || !isNonEmptyString(value.text)) {
      return 'source.text must be a non-empty string';
    }
    if (!('model' in value) || !isNonEmptyString(value.model)) {
      return 'source.model must name a text-to-vector model';
    }
  } else {
    return 'source.type must be "vector" or "text"';
  }

  if (parser instanceof DenseVectorQueryParser && !parser.sourceTypes.includes(type)) {
    return `source.type "${type}" is not supported by ${parser.constructor.name}`;
  }

  return null;
}

function IsVectorSource(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isVectorSource',
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: {
        validate(value: unknown, args: ValidationArguments) {
          return describeSourceProblem(value, args.object) === null;
        },
        defaultMessage(args: ValidationArguments) {
          return describeSourceProblem(args.value, args.object) ?? 'source is invalid';
        },
      },
    });
  };
}

/**
 * Dense vector search. The whole query travels as one local-params string
 * in `q`: `{!<parser> f=<field> ...}<payload>`.
 * https://solr.apache.org/guide/solr/latest/query-guide/dense-vector-search.html
 */
export abstract class DenseVectorQueryParser extends QueryParser {
  @IsString()
  @IsNotEmpty()
  readonly field!: string;

  @IsVectorSource()
  readonly source!: VectorSource;

  @IsOptional()
  @IsStringOrStringArray()
  readonly preFilter?: string | string[];

  @IsOptional()
  @IsStringOrStringArray()
  readonly includeTags?: string | string[];

  @IsOptional()
  @IsStringOrStringArray()
  readonly excludeTags?: string | string[];

  constructor(options: DenseVectorQueryOptions) {
    super(options);
  }

  /**
   * Source kinds this parser accepts
   */
  get sourceTypes(): readonly VectorSourceType[] {
    return ['vector'];
  }

  /**
   * Local-params parser name, e.g. `knn`
   */
  abstract get parserName(): string;

  /**
   * Parser specific local params, written after `f`
   */
  protected abstract localParams(): LocalParamEntry[];

  /**
   * The `q` value
   */
  get localParamsQuery(): string {
    const entries: LocalParamEntry[] = [['f', this.field], ...this.localParams()];

    for (const filter of toList(this.preFilter)) {
      entries.push(['preFilter', filter]);
    }
    if (this.includeTags !== undefined) {
      entries.push(['includeTags', toList(this.includeTags).join(',')]);
    }
    if (this.excludeTags !== undefined) {
      entries.push(['excludeTags', toList(this.excludeTags).join(',')]);
    }

    const payload =
      this.source.type === 'vector' ? formatVectorPayload(this.source.vector) : this.source.text;

    return formatLocalParams(this.parserName, entries, payload);
  }

  protected flattenOwn(): WireParams {
    return { q: this.localParamsQuery };
  }
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}
