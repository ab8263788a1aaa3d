import { Injectable, Logger } from '@nestjs/common';
import { getErrorMessage } from '../common/errors/news-errors';
import { Article, NEUTRAL_SENTIMENT, NOT_AVAILABLE, UnifiedResult } from './interfaces/article.interface';

/** 구분선 */
const RULE = '='.repeat(50);

/** 통합 리포트에 표시할 최대 기사 수 */
export const UNIFIED_REPORT_MAX_ARTICLES = 10;

/** 요약 최대 길이 (통합 리포트) */
export const UNIFIED_SUMMARY_MAX_LENGTH = 150;

/** 요약 최대 길이 (단일 소스 리포트) */
export const SOURCE_SUMMARY_MAX_LENGTH = 200;

/**
 * 최대 길이를 넘는 텍스트를 자르고 "..."을 붙입니다
 */
export function truncateText(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function hasSummary(article: Article): boolean {
  return Boolean(article.summary) && article.summary !== NOT_AVAILABLE;
}

/**
 * 뉴스 리포트 포맷터
 *
 * 통합 결과 또는 단일 소스 기사 목록을 사람이 읽을 수 있는 텍스트로 변환합니다.
 * 렌더링 중 오류가 발생해도 예외를 던지지 않고 오류 설명 문자열을 반환합니다.
 */
@Injectable()
export class NewsSummaryFormatter {
  private readonly logger = new Logger(NewsSummaryFormatter.name);

  /**
   * 통합 결과 리포트
   *
   * 구성:
   * - 헤더 (티커, 전체 기사 수, 소스 목록, 생성 시각)
   * - 소스별 기사 수 및 오류
   * - 최신 기사 최대 10건 (제목, 발행처, 날짜, 감성, 요약 150자)
   */
  formatUnifiedSummary(result: UnifiedResult): string {
    try {
      let summary = `Unified News Summary for ${result.ticker.toUpperCase()}\n`;
      summary += `${RULE}\n\n`;

      summary += `Total Articles: ${result.total_articles}\n`;
      summary += `Sources: ${result.sources.join(', ')}\n`;
      summary += `Generated: ${result.timestamp}\n\n`;

      for (const source of result.sources) {
        const data = result.by_source[source];
        if (!data) continue;

        summary += `${source.toUpperCase()}: ${data.count} articles`;
        if (data.error) {
          summary += ` (Error: ${data.error})`;
        }
        summary += '\n';
      }

      summary += `\n${RULE}\n\n`;

      result.articles.slice(0, UNIFIED_REPORT_MAX_ARTICLES).forEach((article, index) => {
        summary += `${index + 1}. [${article.source.toUpperCase()}] ${article.title}\n`;
        summary += `   Publisher: ${article.publisher}\n`;
        if (article.published_date) {
          summary += `   Date: ${article.published_date}\n`;
        }
        if (article.sentiment !== NEUTRAL_SENTIMENT) {
          summary += `   Sentiment: ${article.sentiment}\n`;
        }
        if (hasSummary(article)) {
          summary += `   Summary: ${truncateText(article.summary, UNIFIED_SUMMARY_MAX_LENGTH)}\n`;
        }
        summary += '\n';
      });

      return summary;
    } catch (error) {
      this.logger.error(`Failed to render unified summary: ${getErrorMessage(error)}`);
      return `Error rendering news summary for ${result.ticker}: ${getErrorMessage(error)}`;
    }
  }

  /**
   * 단일 소스 리포트
   *
   * 기사별로 제목, 발행처, 날짜, 요약(200자), 링크를 출력합니다.
   */
  formatSourceSummary(ticker: string, articles: readonly Article[]): string {
    try {
      if (articles.length === 0) {
        return `No recent news found for ${ticker}`;
      }

      let summary = `Recent News for ${ticker}:\n`;
      summary += `${RULE}\n\n`;

      articles.forEach((article, index) => {
        summary += `${index + 1}. ${article.title}\n`;
        summary += `   Publisher: ${article.publisher}\n`;
        if (article.published_date) {
          summary += `   Date: ${article.published_date}\n`;
        }
        if (hasSummary(article)) {
          summary += `   Summary: ${truncateText(article.summary, SOURCE_SUMMARY_MAX_LENGTH)}\n`;
        }
        if (article.url && article.url !== NOT_AVAILABLE) {
          summary += `   Link: ${article.url}\n`;
        }
        summary += '\n';
      });

      return summary;
    } catch (error) {
      this.logger.error(`Failed to render source summary: ${getErrorMessage(error)}`);
      return `Error rendering news summary for ${ticker}: ${getErrorMessage(error)}`;
    }
  }
}
