import { Marked } from "marked";
import sanitizeHtml from "sanitize-html";

const markdown = new Marked({
  gfm: true,
  breaks: false
});

const toSafeHtml = (rawHtml: string): string =>
  sanitizeHtml(rawHtml, {
    allowedTags: sanitizeHtml.defaults.allowedTags.concat(["img", "h1", "h2", "del"]),
    allowedAttributes: {
      a: ["href", "title"],
      img: ["src", "alt", "title"],
      code: ["class"]
    },
    allowedSchemes: ["http", "https", "mailto"]
  });

/**
 * Converts page Markdown into an HTML fragment. Malformed syntax is rendered
 * literally; raw HTML in the source goes through the sanitizer.
 */
export const renderMarkdown = (source: string): string => {
  const rendered = markdown.parse(source, { async: false });
  return toSafeHtml(typeof rendered === "string" ? rendered : "");
};
