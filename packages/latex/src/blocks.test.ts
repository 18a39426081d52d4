import { renderBlock, resolveImagePath } from "./blocks";
import type { RenderContext, TextLoader } from "./types";

function makeContext(loadText: TextLoader = () => ""): RenderContext {
  return { pageDir: "pages/3", outputDir: "build/tex", loadText, warnings: [] };
}

describe("renderBlock text", () => {
  test("chapter heading", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "text", data: { text: "# Title" } }, ctx)).toBe("\\chapter{Title}\n\n");
  });

  test("section heading", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "text", data: { text: "## Title" } }, ctx)).toBe("\\section{Title}\n\n");
  });

  test("heading text is formatted", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "text", data: { text: "###A & B" } }, ctx)).toBe(
      "\\subsection{A \\& B}\n\n",
    );
  });

  test("deep heading becomes a paragraph", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "text", data: { text: "###### Note" } }, ctx)).toBe(
      "\\paragraph{Note}\n\n",
    );
  });

  test("body text ends with a blank line", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "text", data: { text: "Hello *world*" } }, ctx)).toBe(
      "Hello \\textit{world}\n\n",
    );
  });

  test("body text with a list", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "text", data: { text: "Steps:\n- mix\n- heat" } }, ctx)).toBe(
      "Steps:\n\\begin{itemize}\n\\item mix\n\\item heat\n\\end{itemize}\n\n",
    );
  });

  test("external text is loaded relative to the page", () => {
    const calls: [string, string][] = [];
    const ctx = makeContext((textPath, baseDir) => {
      calls.push([textPath, baseDir]);
      return "## Sub\ntext_1\n- a";
    });
    expect(renderBlock({ type: "text", data: { textPath: "body.txt" } }, ctx)).toBe(
      "\\section{Sub}\ntext\\_1\n\\begin{itemize}\n\\item a\n\\end{itemize}",
    );
    expect(calls).toStrictEqual([["body.txt", "pages/3"]]);
    expect(ctx.warnings).toStrictEqual([]);
  });

  test("inline text wins over a text path", () => {
    const ctx = makeContext(() => "loaded");
    expect(renderBlock({ type: "text", data: { text: "inline", textPath: "x.txt" } }, ctx)).toBe(
      "inline\n\n",
    );
  });

  test("missing text gives a warning", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "text", data: {} }, ctx)).toBe("");
    expect(ctx.warnings).toStrictEqual(["Text block is missing both 'text' and 'textPath'"]);
  });
});

describe("renderBlock image", () => {
  test("figure with caption and label", () => {
    const ctx = makeContext();
    const out = renderBlock(
      {
        type: "image",
        data: { imagePath: "figures/plot.png", caption: "Flow of 5% CO₂", label: "fig:plot" },
      },
      ctx,
    );
    expect(out).toBe(
      "\\begin{figure}[htbp]\n" +
        "\\centering\n" +
        "\\includegraphics[width=0.8\\textwidth]{../../pages/3/figures/plot.png}\n" +
        "\\caption{Flow of 5\\% CO$_{2}$}\n" +
        "\\label{fig:plot}\n" +
        "\\end{figure}\n\n",
    );
  });

  test("figure without caption or label", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "image", data: { imagePath: "a.png" } }, ctx)).toBe(
      "\\begin{figure}[htbp]\n\\centering\n\\includegraphics[width=0.8\\textwidth]{../../pages/3/a.png}\n\\end{figure}\n\n",
    );
  });

  test("missing path gives a warning", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "image", data: { caption: "x" } }, ctx)).toBe("");
    expect(ctx.warnings).toStrictEqual(["Image block is missing 'imagePath'"]);
  });
});

describe("resolveImagePath", () => {
  test("relative to the output directory", () => {
    expect(resolveImagePath("img/a.png", "pages/1", "build/tex")).toBe("../../pages/1/img/a.png");
  });

  test("same directory", () => {
    expect(resolveImagePath("a.png", "build/tex", "build/tex")).toBe("a.png");
  });
});

describe("renderBlock table", () => {
  test("bordered table with formatted cells", () => {
    const ctx = makeContext();
    const out = renderBlock(
      {
        type: "table",
        data: {
          tableData: [
            ["Name", "Value"],
            ["a_b", "50%"],
          ],
          caption: "Data",
          label: "tab:data",
        },
      },
      ctx,
    );
    expect(out).toBe(
      "\\begin{table}[htbp]\n" +
        "\\centering\n" +
        "\\begin{tabular}{c|c}\n" +
        "\\hline\n" +
        "Name & Value \\\\ \\hline\n" +
        "a\\_b & 50\\% \\\\ \\hline\n" +
        "\\end{tabular}\n" +
        "\\caption{Data}\n" +
        "\\label{tab:data}\n" +
        "\\end{table}\n\n",
    );
  });

  test("column count comes from the first row", () => {
    const ctx = makeContext();
    const out = renderBlock({ type: "table", data: { tableData: [["a", "b", "c"], ["d"]] } }, ctx);
    expect(out.split("\n")[2]).toBe("\\begin{tabular}{c|c|c}");
    expect(out.split("\n")[5]).toBe("d \\\\ \\hline");
  });

  test("empty table data gives an empty fragment", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "table", data: { tableData: [] } }, ctx)).toBe("");
    expect(renderBlock({ type: "table", data: {} }, ctx)).toBe("");
    expect(ctx.warnings).toStrictEqual([]);
  });
});

describe("renderBlock code", () => {
  test("code is verbatim", () => {
    const ctx = makeContext();
    const out = renderBlock(
      { type: "code", data: { code: "x = a_b & 1", language: "python", caption: "Demo" } },
      ctx,
    );
    expect(out).toBe(
      "\\begin{listing}[H]\n" +
        "\\begin{minted}[breaklines, linenos]{python}\n" +
        "x = a_b & 1\n" +
        "\\end{minted}\n" +
        "\\caption{Demo}\n" +
        "\\end{listing}\n\n",
    );
  });

  test("listing defaults to plain text", () => {
    const ctx = makeContext();
    const out = renderBlock({ type: "listing", data: { code: "ls", label: "lst:ls" } }, ctx);
    expect(out).toBe(
      "\\begin{listing}[H]\n\\begin{minted}[breaklines, linenos]{text}\nls\n\\end{minted}\n\\label{lst:ls}\n\\end{listing}\n\n",
    );
  });
});

describe("renderBlock equation", () => {
  test("numbered equation with label", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "equation", data: { equation: "E = mc^2", label: "eq:e" } }, ctx)).toBe(
      "\\begin{equation}\n\\label{eq:e}\nE = mc^2\n\\end{equation}\n\n",
    );
  });

  test("equation without label", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "equation", data: { equation: "a_1 + b" } }, ctx)).toBe(
      "\\begin{equation}\na_1 + b\n\\end{equation}\n\n",
    );
  });
});

describe("renderBlock unsupported", () => {
  test("unknown kind gives an empty fragment and one warning", () => {
    const ctx = makeContext();
    expect(renderBlock({ type: "unsupported", originalType: "video" }, ctx)).toBe("");
    expect(ctx.warnings).toStrictEqual(["Unknown content block type: video"]);
  });
});
