import { ContentExtractor } from "../../core/content";

const LONG = "Ownership rules decide when memory is freed without a garbage collector.";

describe("[Core] ContentExtractor", () => {
  const extractor = new ContentExtractor();

  test("should prefer the article element and drop page chrome", () => {
    const html = `
      <html><head><title>t</title><style>p { color: red }</style></head>
      <body>
        <nav>Home About</nav>
        <header>Site header</header>
        <article><h1>Borrowing</h1><p>${LONG}</p><script>track()</script></article>
        <footer>Copyright</footer>
      </body></html>`;

    expect(extractor.extract(html)).toBe(`Borrowing ${LONG}`);
  });

  test("should fall through candidates that are too short", () => {
    const html = `
      <body>
        <article>Short teaser</article>
        <div class="post-body"><p>${LONG}</p></div>
      </body>`;

    expect(extractor.extract(html)).toBe(LONG);
  });

  test("should match content classes case-insensitively", () => {
    const html = `<body><section class="MainContent"><p>${LONG}</p></section><aside>ads</aside></body>`;

    expect(extractor.extract(html)).toBe(LONG);
  });

  test("should fall back to the body", () => {
    const html = `<body><div><span>${LONG}</span>\n\n   <b>More   text</b></div></body>`;

    expect(extractor.extract(html)).toBe(`${LONG} More text`);
  });

  test("should return an empty string when nothing is long enough", () => {
    expect(extractor.extract("<body><p>tiny</p></body>")).toBe("");
  });

  test("should truncate to the requested length", () => {
    expect(extractor.extract(`<article>${LONG}</article>`, 9)).toBe("Ownership");
  });
});
