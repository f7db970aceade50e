import { describe, expect, it } from "vitest";
import { renderMarkdown } from "../src/lib/markdown.js";

describe("renderMarkdown", () => {
  it("renders a level one heading", () => {
    expect(renderMarkdown("# Hi")).toContain("<h1>Hi</h1>");
  });

  it("renders emphasis, lists and code spans", () => {
    const html = renderMarkdown("*soft* and **loud**\n\n- one\n- two\n\n`a<b`");
    expect(html).toContain("<em>soft</em>");
    expect(html).toContain("<strong>loud</strong>");
    expect(html).toContain("<li>one</li>");
    expect(html).toContain("<li>two</li>");
    expect(html).toContain("<code>a&lt;b</code>");
  });

  it("keeps http links", () => {
    expect(renderMarkdown("[docs](https://example.com/docs)")).toContain('<a href="https://example.com/docs">docs</a>');
  });

  it("renders unbalanced markup literally", () => {
    expect(renderMarkdown("**unclosed")).toContain("<p>**unclosed</p>");
  });

  it("strips script tags from raw html", () => {
    const html = renderMarkdown("<script>alert(1)</script>\n\nafter");
    expect(html).not.toContain("<script");
    expect(html).toContain("<p>after</p>");
  });

  it("drops javascript: link targets", () => {
    const html = renderMarkdown("[click](javascript:alert(1))");
    expect(html).not.toContain("javascript:");
    expect(html).toContain(">click</a>");
  });
});
