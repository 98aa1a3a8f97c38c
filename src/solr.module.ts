import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { SolrClient, SolrClientOptions } from './client/lib/client';
import solrConfig, { toClientOptions } from './config/solr.config';

/**
 * Provides a {@link SolrClient}, configured from explicit options or, when
 * none are given, from the `SOLR_*` environment variables.
 *
 * @example
 * @Module({ imports: [SolrModule.forRoot()] })
 * export class CatalogModule {}
 */
@Module({})
export class SolrModule {
  static forRoot(options?: SolrClientOptions): DynamicModule {
    if (options !== undefined) {
      return {
        module: SolrModule,
        providers: [{ provide: SolrClient, useValue: new SolrClient(options) }],
        exports: [SolrClient],
      };
    }

    return {
      module: SolrModule,
      imports: [ConfigModule.forFeature(solrConfig)],
      providers: [
        {
          provide: SolrClient,
          useFactory: (config: ConfigType<typeof solrConfig>) =>
            new SolrClient(toClientOptions(config)),
          inject: [solrConfig.KEY],
        },
      ],
      exports: [SolrClient],
    };
  }
}
