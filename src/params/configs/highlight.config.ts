import { IsBoolean, IsIn, IsInt, IsNumber, IsOptional, IsString, Max, Min } from 'class-validator';
import { IsStringOrStringArray } from '../../common/validation/decorators';
import { ParamField, WireParams, flattenFields } from '../wire-params';
import { ParamsConfig } from './params-config';

export const HIGHLIGHT_METHODS = ['unified', 'original', 'fastVector'] as const;
export type HighlightMethod = (typeof HIGHLIGHT_METHODS)[number];

export const HIGHLIGHT_ENCODERS = ['html', ''] as const;
export type HighlightEncoder = (typeof HIGHLIGHT_ENCODERS)[number];

/**
 * Passage boundaries for the unified and fastVector highlighters
 */
export const BREAK_ITERATOR_TYPES = [
  'SEPARATOR',
  'SENTENCE',
  'WORD',
  'CHARACTER',
  'LINE',
  'WHOLE',
] as const;
export type BreakIteratorType = (typeof BREAK_ITERATOR_TYPES)[number];

export const HIGHLIGHT_FORMATTERS = ['simple'] as const;
export type HighlightFormatter = (typeof HIGHLIGHT_FORMATTERS)[number];

export const HIGHLIGHT_FRAGMENTERS = ['gap', 'regex'] as const;
export type HighlightFragmenter = (typeof HIGHLIGHT_FRAGMENTERS)[number];

export const FRAG_LIST_BUILDERS = ['simple', 'weighted', 'single'] as const;
export type FragListBuilder = (typeof FRAG_LIST_BUILDERS)[number];

export const FRAGMENTS_BUILDERS = ['default', 'colored'] as const;
export type FragmentsBuilder = (typeof FRAGMENTS_BUILDERS)[number];

export interface HighlightOptions {
  method?: HighlightMethod;
  /** Fields to highlight (`hl.fl`) */
  fields?: string | string[];
  /** Query to highlight instead of `q` */
  query?: string;
  queryParser?: string;
  requireFieldMatch?: boolean;
  queryFieldPattern?: string;
  usePhraseHighlighter?: boolean;
  highlightMultiTerm?: boolean;
  snippets?: number;
  fragsize?: number;
  encoder?: HighlightEncoder;
  maxAnalyzedChars?: number;
  tagPre?: string;
  tagPost?: string;

  // unified highlighter
  offsetSource?: string;
  fragAlignRatio?: number;
  fragsizeIsMinimum?: boolean;
  tagEllipsis?: string;
  defaultSummary?: boolean;
  scoreK1?: number;
  scoreB?: number;
  scorePivot?: number;
  bsLanguage?: string;
  bsCountry?: string;
  bsVariant?: string;
  bsType?: BreakIteratorType;
  bsSeparator?: string;
  weightMatches?: boolean;

  // original highlighter
  mergeContiguous?: boolean;
  maxMultiValuedToExamine?: number;
  maxMultiValuedToMatch?: number;
  alternateField?: string;
  maxAlternateFieldLength?: number;
  highlightAlternate?: boolean;
  formatter?: HighlightFormatter;
  simplePre?: string;
  simplePost?: string;
  fragmenter?: HighlightFragmenter;
  regexSlop?: number;
  regexPattern?: string;
  regexMaxAnalyzedChars?: number;
  preserveMulti?: boolean;
  payloads?: boolean;

  // fastVector highlighter
  fragListBuilder?: FragListBuilder;
  fragmentsBuilder?: FragmentsBuilder;
  boundaryScanner?: string;
  phraseLimit?: number;
  multiValuedSeparatorChar?: string;
}

const HIGHLIGHT_FIELDS: ReadonlyArray<ParamField<HighlightParamsConfig>> = [
  { property: 'method', wire: 'method' },
  { property: 'fields', wire: 'fl', encoding: 'comma' },
  { property: 'query', wire: 'q' },
  { property: 'queryParser', wire: 'qparser' },
  { property: 'requireFieldMatch', wire: 'requireFieldMatch' },
  { property: 'queryFieldPattern', wire: 'queryFieldPattern' },
  { property: 'usePhraseHighlighter', wire: 'usePhraseHighlighter' },
  { property: 'highlightMultiTerm', wire: 'highlightMultiTerm' },
  { property: 'snippets', wire: 'snippets' },
  { property: 'fragsize', wire: 'fragsize' },
  { property: 'encoder', wire: 'encoder' },
  { property: 'maxAnalyzedChars', wire: 'maxAnalyzedChars' },
  { property: 'tagPre', wire: 'tag.pre' },
  { property: 'tagPost', wire: 'tag.post' },
  { property: 'offsetSource', wire: 'offsetSource' },
  { property: 'fragAlignRatio', wire: 'fragAlignRatio' },
  { property: 'fragsizeIsMinimum', wire: 'fragsizeIsMinimum' },
  { property: 'tagEllipsis', wire: 'tag.ellipsis' },
  { property: 'defaultSummary', wire: 'defaultSummary' },
  { property: 'scoreK1', wire: 'score.k1' },
  { property: 'scoreB', wire: 'score.b' },
  { property: 'scorePivot', wire: 'score.pivot' },
  { property: 'bsLanguage', wire: 'bs.language' },
  { property: 'bsCountry', wire: 'bs.country' },
  { property: 'bsVariant', wire: 'bs.variant' },
  { property: 'bsType', wire: 'bs.type' },
  { property: 'bsSeparator', wire: 'bs.separator' },
  { property: 'weightMatches', wire: 'weightMatches' },
  { property: 'mergeContiguous', wire: 'mergeContiguous' },
  { property: 'maxMultiValuedToExamine', wire: 'maxMultiValuedToExamine' },
  { property: 'maxMultiValuedToMatch', wire: 'maxMultiValuedToMatch' },
  { property: 'alternateField', wire: 'alternateField' },
  { property: 'maxAlternateFieldLength', wire: 'maxAlternateFieldLength' },
  { property: 'highlightAlternate', wire: 'highlightAlternate' },
  { property: 'formatter', wire: 'formatter' },
  { property: 'simplePre', wire: 'simple.pre' },
  { property: 'simplePost', wire: 'simple.post' },
  { property: 'fragmenter', wire: 'fragmenter' },
  { property: 'regexSlop', wire: 'regex.slop' },
  { property: 'regexPattern', wire: 'regex.pattern' },
  { property: 'regexMaxAnalyzedChars', wire: 'regex.maxAnalyzedChars' },
  { property: 'preserveMulti', wire: 'preserveMulti' },
  { property: 'payloads', wire: 'payloads' },
  { property: 'fragListBuilder', wire: 'fragListBuilder' },
  { property: 'fragmentsBuilder', wire: 'fragmentsBuilder' },
  { property: 'boundaryScanner', wire: 'boundaryScanner' },
  { property: 'phraseLimit', wire: 'phraseLimit' },
  { property: 'multiValuedSeparatorChar', wire: 'multiValuedSeparatorChar' },
];

/**
 * Highlighting: matched fragments per document and field.
 * https://solr.apache.org/guide/solr/latest/query-guide/highlighting.html
 *
 * The unified highlighter is Solr's default; options specific to the
 * original and fastVector highlighters are ignored by the others.
 */
export class HighlightParamsConfig extends ParamsConfig {
  @IsOptional()
  @IsIn(HIGHLIGHT_METHODS)
  readonly method?: HighlightMethod;

  @IsOptional()
  @IsStringOrStringArray()
  readonly fields?: string | string[];

  @IsOptional()
  @IsString()
  readonly query?: string;

  @IsOptional()
  @IsString()
  readonly queryParser?: string;

  @IsOptional()
  @IsBoolean()
  readonly requireFieldMatch?: boolean;

  @IsOptional()
  @IsString()
  readonly queryFieldPattern?: string;

  @IsOptional()
  @IsBoolean()
  readonly usePhraseHighlighter?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly highlightMultiTerm?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly snippets?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly fragsize?: number;

  @IsOptional()
  @IsIn(HIGHLIGHT_ENCODERS)
  readonly encoder?: HighlightEncoder;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly maxAnalyzedChars?: number;

  @IsOptional()
  @IsString()
  readonly tagPre?: string;

  @IsOptional()
  @IsString()
  readonly tagPost?: string;

  @IsOptional()
  @IsString()
  readonly offsetSource?: string;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(1)
  readonly fragAlignRatio?: number;

  @IsOptional()
  @IsBoolean()
  readonly fragsizeIsMinimum?: boolean;

  @IsOptional()
  @IsString()
  readonly tagEllipsis?: string;

  @IsOptional()
  @IsBoolean()
  readonly defaultSummary?: boolean;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  readonly scoreK1?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(1)
  readonly scoreB?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly scorePivot?: number;

  @IsOptional()
  @IsString()
  readonly bsLanguage?: string;

  @IsOptional()
  @IsString()
  readonly bsCountry?: string;

  @IsOptional()
  @IsString()
  readonly bsVariant?: string;

  @IsOptional()
  @IsIn(BREAK_ITERATOR_TYPES)
  readonly bsType?: BreakIteratorType;

  @IsOptional()
  @IsString()
  readonly bsSeparator?: string;

  @IsOptional()
  @IsBoolean()
  readonly weightMatches?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly mergeContiguous?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly maxMultiValuedToExamine?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly maxMultiValuedToMatch?: number;

  @IsOptional()
  @IsString()
  readonly alternateField?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly maxAlternateFieldLength?: number;

  @IsOptional()
  @IsBoolean()
  readonly highlightAlternate?: boolean;

  @IsOptional()
  @IsIn(HIGHLIGHT_FORMATTERS)
  readonly formatter?: HighlightFormatter;

  @IsOptional()
  @IsString()
  readonly simplePre?: string;

  @IsOptional()
  @IsString()
  readonly simplePost?: string;

  @IsOptional()
  @IsIn(HIGHLIGHT_FRAGMENTERS)
  readonly fragmenter?: HighlightFragmenter;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  readonly regexSlop?: number;

  @IsOptional()
  @IsString()
  readonly regexPattern?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly regexMaxAnalyzedChars?: number;

  @IsOptional()
  @IsBoolean()
  readonly preserveMulti?: boolean;

  @IsOptional()
  @IsBoolean()
  readonly payloads?: boolean;

  @IsOptional()
  @IsIn(FRAG_LIST_BUILDERS)
  readonly fragListBuilder?: FragListBuilder;

  @IsOptional()
  @IsIn(FRAGMENTS_BUILDERS)
  readonly fragmentsBuilder?: FragmentsBuilder;

  @IsOptional()
  @IsString()
  readonly boundaryScanner?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  readonly phraseLimit?: number;

  @IsOptional()
  @IsString()
  readonly multiValuedSeparatorChar?: string;

  constructor(options: HighlightOptions = {}) {
    super(options);
  }

  get enableKey(): string {
    return 'hl';
  }

  get namespace(): string {
    return 'hl.';
  }

  protected flattenOptions(): WireParams {
    return flattenFields<HighlightParamsConfig>(this, HIGHLIGHT_FIELDS, this.namespace);
  }
}
