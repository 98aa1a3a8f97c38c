import { ConfigurationError } from '../../common/errors/configuration.error';
import { HighlightParamsConfig } from './highlight.config';

describe('HighlightParamsConfig', () => {
  it('should turn highlighting on even without options', () => {
    expect(new HighlightParamsConfig().flatten()).toEqual({ hl: true });
  });

  it('should write options under the hl namespace', () => {
    const config = new HighlightParamsConfig({
      method: 'unified',
      fields: ['title', 'body'],
      snippets: 2,
      tagPre: '<b>',
      tagPost: '</b>',
    });

    expect(config.flatten()).toEqual({
      hl: true,
      'hl.method': 'unified',
      'hl.fl': 'title,body',
      'hl.snippets': 2,
      'hl.tag.pre': '<b>',
      'hl.tag.post': '</b>',
    });
  });

  it('should reject a fragment alignment ratio above 1', () => {
    expect(() => new HighlightParamsConfig({ fragAlignRatio: 1.5 })).toThrow(ConfigurationError);
  });
});
