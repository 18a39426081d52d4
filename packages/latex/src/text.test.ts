import { assembleText, detectLists } from "./text";

describe("detectLists", () => {
  test("wraps consecutive items and closes on the first other line", () => {
    expect(detectLists("- a\n- b\nnot a list").split("\n")).toStrictEqual([
      "\\begin{itemize}",
      "\\item a",
      "\\item b",
      "\\end{itemize}",
      "not a list",
    ]);
  });

  test("closes a list at the end of input", () => {
    expect(detectLists("intro\n  - x")).toBe("intro\n\\begin{itemize}\n\\item x\n\\end{itemize}");
  });

  test("separate runs give separate lists", () => {
    expect(detectLists("- a\nmid\n- b")).toBe(
      "\\begin{itemize}\n\\item a\n\\end{itemize}\nmid\n\\begin{itemize}\n\\item b\n\\end{itemize}",
    );
  });

  test("indented items do not nest", () => {
    expect(detectLists("- a\n    - b")).toBe("\\begin{itemize}\n\\item a\n\\item b\n\\end{itemize}");
  });

  test("a dash without a space is not an item", () => {
    expect(detectLists("-not\n--also not")).toBe("-not\n--also not");
  });

  test("text without items is unchanged", () => {
    expect(detectLists("one\n\ntwo")).toBe("one\n\ntwo");
  });
});

describe("assembleText", () => {
  test("inline text is formatted, then lists are detected", () => {
    expect(assembleText("Use 50% of x_y\n- one\n- two", { lineHeadings: false })).toBe(
      "Use 50\\% of x\\_y\n\\begin{itemize}\n\\item one\n\\item two\n\\end{itemize}",
    );
  });

  test("line headings are converted before formatting", () => {
    const text = "# Intro\nBody & more\n## Part\n- item";
    expect(assembleText(text, { lineHeadings: true })).toBe(
      "\\chapter{Intro}\nBody \\& more\n\\section{Part}\n\\begin{itemize}\n\\item item\n\\end{itemize}",
    );
  });

  test("the toggle decides how a heading without a space is read", () => {
    expect(assembleText("#Intro", { lineHeadings: true })).toBe("\\chapter{Intro}");
    expect(assembleText("#Intro", { lineHeadings: false })).toBe("\\#Intro");
  });

  test("line heading titles keep their math", () => {
    expect(assembleText("  ### Value of $x_1$", { lineHeadings: true })).toBe(
      "\\subsection{Value of $x_1$}",
    );
  });

  test("a blank line before a heading line stays blank", () => {
    expect(assembleText("a\n\n# H", { lineHeadings: true })).toBe("a\n\n\\chapter{H}");
  });

  test("paragraph breaks survive around line headings", () => {
    expect(assembleText("a\n\nb\n# H", { lineHeadings: true })).toBe("a\n\\par\nb\n\\chapter{H}");
  });
});
