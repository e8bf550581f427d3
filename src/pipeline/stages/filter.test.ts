import { describe, it, expect } from "vitest";
import { applyPageBreaks, stripTableOfContents } from "./filter";

const DIV = '<div class="page-break"></div>';

describe("stripTableOfContents", () => {
  it("removes the section up to the next heading", () => {
    const content =
      "# Guide\n\n## Table of contents\n\n- [Intro](#intro)\n- [Usage](#usage)\n\n## Intro\n\nHello\n";

    expect(stripTableOfContents(content)).toBe("# Guide\n\n## Intro\n\nHello\n");
  });

  it("removes a trailing section case-insensitively", () => {
    const content = "# Doc\n\nText\n\n### TABLE OF CONTENTS\n- a\n";

    expect(stripTableOfContents(content)).toBe("# Doc\n\nText\n\n");
  });

  it("leaves documents without one untouched", () => {
    const content = "# Doc\n\n\n\nText about a table of contents\n";

    expect(stripTableOfContents(content)).toBe(content);
  });
});

describe("applyPageBreaks", () => {
  const content = "A\n<!-- page-break -->\nB\n<page-break>\nC\n```page-break\n```\nD\n---\n{.page-break}\nE";

  it("turns every marker into a break for paged output", () => {
    expect(applyPageBreaks(content, true)).toBe(
      `A\n${DIV}\nB\n${DIV}\nC\n${DIV}\nD\n${DIV}\nE`,
    );
  });

  it("drops markers for reflowable output", () => {
    expect(applyPageBreaks(content, false)).toBe("A\n\nB\n\nC\n\nD\n\nE");
  });

  it("drops existing break divs for reflowable output", () => {
    expect(applyPageBreaks(`A\n${DIV}\nB`, false)).toBe("A\n\nB");
    expect(applyPageBreaks(`A\n${DIV}\nB`, true)).toBe(`A\n${DIV}\nB`);
  });
});
