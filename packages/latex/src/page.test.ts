import { composePage, renderPage, renderReferenceComments } from "./page";
import type { Page, RenderContext } from "./types";

describe("composePage", () => {
  test("heading, blocks in order, then references", () => {
    const page: Page = {
      title: "Results & Discussion",
      sectionLevel: 2,
      content: [
        { type: "text", data: { text: "Intro" } },
        { type: "equation", data: { equation: "a=b" } },
        { type: "text", data: { text: "Outro" } },
      ],
      references: [
        { id: "smith2020", citation: "Smith, 2020" },
        { id: "doe2019", citation: "@article{doe2019, title={X}}" },
      ],
    };
    const ctx: RenderContext = { pageDir: "pages/1", outputDir: "build/tex", loadText: () => "", warnings: [] };
    expect(composePage(page, ctx)).toBe(
      "\\section{Results \\& Discussion}\n\n" +
        "Intro\n\n" +
        "\\begin{equation}\na=b\n\\end{equation}\n\n" +
        "Outro\n\n" +
        "% References used in this page:\n" +
        "% These will be collected into the main bibliography file\n" +
        "% smith2020: Smith, 2020\n" +
        "% doe2019: @article{doe2019, title={X}}\n",
    );
  });

  test("deep section levels use paragraph", () => {
    const page: Page = { title: "Aside", sectionLevel: 7, content: [] };
    const ctx: RenderContext = { pageDir: ".", outputDir: ".", loadText: () => "", warnings: [] };
    expect(composePage(page, ctx)).toBe("\\paragraph{Aside}\n\n");
  });
});

describe("renderReferenceComments", () => {
  test("nothing for no references", () => {
    expect(renderReferenceComments([])).toBe("");
  });
});

describe("renderPage", () => {
  test("collects warnings from every block", () => {
    const page: Page = {
      title: "Broken",
      sectionLevel: 1,
      content: [
        { type: "unsupported", originalType: "video" },
        { type: "text", data: {} },
        { type: "text", data: { text: "kept" } },
      ],
    };
    const result = renderPage(page, { pageDir: "pages/2", outputDir: "build/tex" });
    expect(result.markup).toBe("\\chapter{Broken}\n\nkept\n\n");
    expect(result.warnings).toStrictEqual([
      "Unknown content block type: video",
      "Text block is missing both 'text' and 'textPath'",
    ]);
  });

  test("passes the text loader through", () => {
    const page: Page = {
      title: "Loaded",
      sectionLevel: 1,
      content: [{ type: "text", data: { textPath: "a.txt" } }],
    };
    const result = renderPage(page, {
      pageDir: "pages/2",
      outputDir: "build/tex",
      loadText: (textPath, baseDir) => `${baseDir}/${textPath}`,
    });
    expect(result.markup).toBe("\\chapter{Loaded}\n\npages/2/a.txt");
    expect(result.warnings).toStrictEqual([]);
  });

  test("external text without a loader is reported", () => {
    const page: Page = {
      title: "Bare",
      sectionLevel: 2,
      content: [{ type: "text", data: { textPath: "a.txt" } }],
    };
    const result = renderPage(page, { pageDir: "pages/2", outputDir: "build/tex" });
    expect(result.markup).toBe("\\section{Bare}\n\n");
    expect(result.warnings).toStrictEqual(["No text loader for external text: a.txt"]);
  });

  test("pages do not share warnings", () => {
    const page: Page = { title: "A", sectionLevel: 1, content: [{ type: "text", data: {} }] };
    const first = renderPage(page, { pageDir: ".", outputDir: "." });
    const second = renderPage(page, { pageDir: ".", outputDir: "." });
    expect(first.warnings).toHaveLength(1);
    expect(second.warnings).toHaveLength(1);
  });
});
