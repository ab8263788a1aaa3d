import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createNewsSourceAdapters, loadNewsSourcesConfig } from './config/news-sources.config';
import { NEWS_SOURCE_ADAPTERS } from './interfaces/news-source-adapter.interface';
import { NewsAggregatorService } from './news-aggregator.service';
import { NewsSummaryFormatter } from './news-summary.formatter';
import { NewsController } from './news.controller';

@Module({
  controllers: [NewsController],
  providers: [
    {
      provide: NEWS_SOURCE_ADAPTERS,
      useFactory: (configService: ConfigService) =>
        createNewsSourceAdapters(loadNewsSourcesConfig(configService)),
      inject: [ConfigService],
    },
    NewsSummaryFormatter,
    NewsAggregatorService,
  ],
  exports: [NewsAggregatorService, NewsSummaryFormatter],
})
export class NewsModule {}
