import { normalizeNewsSiteArticle } from './news-site.normalizer';

describe('normalizeNewsSiteArticle', () => {
  it('maps a news site record', () => {
    const record = {
      title: 'Analyst upgrades AAPL',
      url: 'https://site.example/news/1',
      siteName: 'Example Markets',
      date: '2025-10-15T14:20:00.000Z',
      sentiment: 'positive',
      companyName: 'Apple Inc.',
      ticker: 'AAPL',
    };

    expect(normalizeNewsSiteArticle(record)).toEqual({
      title: 'Analyst upgrades AAPL',
      summary: 'N/A',
      url: 'https://site.example/news/1',
      publisher: 'Example Markets',
      published_date: '2025-10-15 14:20:00',
      sentiment: 'positive',
      source: 'news-site',
      ticker: null,
      thumbnail: null,
      content_type: 'article',
      company_name: 'Apple Inc.',
      raw_data: record,
    });
  });

  it('falls back to urlString', () => {
    expect(normalizeNewsSiteArticle({ urlString: 'https://site.example/alt' }).url).toBe('https://site.example/alt');
  });

  it('substitutes defaults when every optional field is missing', () => {
    expect(normalizeNewsSiteArticle({})).toMatchObject({
      title: 'N/A',
      summary: 'N/A',
      url: 'N/A',
      publisher: 'N/A',
      published_date: null,
      sentiment: 'neutral',
      company_name: null,
    });
  });

  it('ignores non-string values', () => {
    const article = normalizeNewsSiteArticle({ title: 42, date: 1729000000, sentiment: null });

    expect(article.title).toBe('N/A');
    expect(article.published_date).toBeNull();
    expect(article.sentiment).toBe('neutral');
  });

  it('keeps an unparseable date raw', () => {
    expect(normalizeNewsSiteArticle({ date: '15/10/2025' }).published_date).toBe('15/10/2025');
  });
});
