import { HeuristicSemanticAnalyzer, tokenize } from '../HeuristicSemanticAnalyzer';

const PAGE = `<!doctype html>
<html>
  <head>
    <title> Widget   Guide </title>
    <meta name="description" content="All about widgets">
  </head>
  <body>
    <nav><a href="/">Home</a> menu</nav>
    <h1>Widgets</h1>
    <h2>Installing widgets</h2>
    <h3>Details</h3>
    <p>Widgets help developers ship software faster.</p>
    <p>Contact   sales@example.com today.</p>
    <script>var hidden = 1;</script>
    <footer>Copyright</footer>
  </body>
</html>`;

describe('HeuristicSemanticAnalyzer', () => {
  const analyzer = new HeuristicSemanticAnalyzer(16);

  describe('extractContent', () => {
    it('reads title, description, headings and paragraphs', async () => {
      const content = await analyzer.extractContent(PAGE, 'https://example.com/');

      expect(content).toEqual({
        title: 'Widget Guide',
        description: 'All about widgets',
        headings: [
          { level: 1, text: 'Widgets' },
          { level: 2, text: 'Installing widgets' },
          { level: 3, text: 'Details' },
        ],
        paragraphs: ['Widgets help developers ship software faster.', 'Contact sales@example.com today.'],
        text: 'Widgets help developers ship software faster. Contact sales@example.com today.',
      });
    });

    it('falls back to the first h1 and a truncated first paragraph', async () => {
      const long = 'x'.repeat(150);
      const content = await analyzer.extractContent(`<h1>Main</h1><p>${long}</p>`, 'https://example.com/');

      expect(content.title).toBe('Main');
      expect(content.description).toBe(`${'x'.repeat(100)}...`);
    });

    it('uses the body text when a page has no paragraphs', async () => {
      const content = await analyzer.extractContent('<div>Just <span>some</span>   text</div>', 'https://example.com/');

      expect(content.text).toBe('Just some text');
      expect(content.title).toBe('');
      expect(content.description).toBe('');
    });
  });

  describe('extractEntities', () => {
    it('finds each entity once, grouped by type', async () => {
      const text =
        'Mail sales@example.com or call 555-123-4567 before 12/31/2024 to pay $1,200.50, ' +
        'see https://example.com/docs and write sales@example.com again';

      expect(await analyzer.extractEntities(text)).toEqual([
        { type: 'EMAIL', value: 'sales@example.com' },
        { type: 'URL', value: 'https://example.com/docs' },
        { type: 'PHONE', value: '555-123-4567' },
        { type: 'DATE', value: '12/31/2024' },
        { type: 'MONEY', value: '$1,200.50' },
      ]);
    });

    it('returns nothing for plain prose', async () => {
      expect(await analyzer.extractEntities('nothing to see here')).toEqual([]);
    });
  });

  describe('extractTopics', () => {
    it('ranks keywords and matches categories', async () => {
      const topics = await analyzer.extractTopics({
        title: '',
        description: '',
        headings: [
          { level: 1, text: 'Software guide' },
          { level: 3, text: 'Deep detail' },
        ],
        paragraphs: [],
        text: 'widgets widgets gadgets the software software software tools',
      });

      expect(topics).toEqual({
        keywords: ['software', 'widgets', 'gadgets', 'tools'],
        mainTopics: ['Software guide'],
        categories: ['Technology', 'Education', 'Documentation'],
      });
    });
  });

  describe('generateEmbedding', () => {
    it('returns unit vectors of the configured dimension', async () => {
      const embedding = await analyzer.generateEmbedding('widgets and gadgets for developers');
      const norm = Math.sqrt(embedding.reduce((sum, value) => sum + value * value, 0));

      expect(embedding).toHaveLength(16);
      expect(norm).toBeCloseTo(1);
    });

    it('ignores case and stop words', async () => {
      expect(await analyzer.generateEmbedding('The Widgets')).toEqual(await analyzer.generateEmbedding('widgets'));
    });

    it('returns the zero vector for text without content words', async () => {
      expect(await analyzer.generateEmbedding('the and of')).toEqual(new Array(16).fill(0));
      expect(await analyzer.generateEmbedding('')).toEqual(new Array(16).fill(0));
    });
  });
});

describe('tokenize', () => {
  it('lowercases and keeps alphabetic words', () => {
    expect(tokenize('Hello, World! 42 times')).toEqual(['hello', 'world', 'times']);
  });
});
