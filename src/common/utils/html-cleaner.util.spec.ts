import { HtmlCleaner, NO_BODY_CONTENT_FOUND, NO_TITLE_FOUND } from './html-cleaner.util';

describe('HtmlCleaner', () => {
  it('extracts the title and trimmed body text blocks in document order', () => {
    const html = `
      <html>
        <head><title>  Daily Brief  </title></head>
        <body>
          <h1>  Top story  </h1>
          <div><p>First <b>bold</b> paragraph</p></div>
          <p>Second</p>
        </body>
      </html>`;

    expect(HtmlCleaner.clean(html)).toEqual({
      title: 'Daily Brief',
      text: 'Top story\nFirst\nbold\nparagraph\nSecond',
      hasBody: true,
    });
  });

  it('removes non-content elements from the body', () => {
    const html = `<html><head><title>T</title></head><body>
      <header>Site header</header>
      <nav><a href="/">Home</a></nav>
      <script>var tracking = 1;</script>
      <style>.x { color: red; }</style>
      <form><input value="search" /><label>Search label</label></form>
      <img src="a.png" alt="picture" />
      <main><p>Story text</p></main>
      <footer>Copyright</footer>
    </body></html>`;

    expect(HtmlCleaner.clean(html).text).toBe('Story text');
  });

  it('skips comments and decodes entities', () => {
    const html = '<html><body><!-- hidden --><p>Fish &amp; chips</p></body></html>';

    expect(HtmlCleaner.clean(html).text).toBe('Fish & chips');
  });

  it('falls back when there is no title', () => {
    expect(HtmlCleaner.clean('<html><body><p>x</p></body></html>').title).toBe(NO_TITLE_FOUND);
  });

  it('reports missing body content', () => {
    expect(HtmlCleaner.clean('<html><head><title>Only head</title></head></html>')).toEqual({
      title: 'Only head',
      text: NO_BODY_CONTENT_FOUND,
      hasBody: false,
    });
  });

  it('returns empty text for an empty body', () => {
    expect(HtmlCleaner.clean('<body>   </body>')).toEqual({
      title: NO_TITLE_FOUND,
      text: '',
      hasBody: true,
    });
  });
});
