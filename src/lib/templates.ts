import { escapeHtml, formatDate, renderLayout, wikiPath } from "./render.js";

export type TemplateContext = Record<string, unknown>;

export class TemplateRenderError extends Error {
  readonly templateName: string;

  constructor(templateName: string, message: string) {
    super(`Template "${templateName}": ${message}`);
    this.name = "TemplateRenderError";
    this.templateName = templateName;
  }
}

const contextReader = (templateName: string, context: TemplateContext) => {
  const read = (key: string): unknown => {
    if (!Object.hasOwn(context, key)) {
      throw new TemplateRenderError(templateName, `missing context key "${key}"`);
    }
    return context[key];
  };

  const mistyped = (key: string, expected: string): TemplateRenderError =>
    new TemplateRenderError(templateName, `context key "${key}" must be ${expected}`);

  return {
    string(key: string): string {
      const value = read(key);
      if (typeof value !== "string") throw mistyped(key, "a string");
      return value;
    },

    boolean(key: string): boolean {
      const value = read(key);
      if (typeof value !== "boolean") throw mistyped(key, "a boolean");
      return value;
    },

    stringList(key: string): string[] {
      const value = read(key);
      if (!Array.isArray(value)) throw mistyped(key, "a list of strings");
      const items: string[] = [];
      for (const item of value) {
        if (typeof item !== "string") throw mistyped(key, "a list of strings");
        items.push(item);
      }
      return items;
    },

    optionalId(key: string): number | null {
      const value = read(key);
      if (value === null) return null;
      if (typeof value !== "number" || !Number.isInteger(value)) throw mistyped(key, "an integer or null");
      return value;
    }
  };
};

type ContextReader = ReturnType<typeof contextReader>;

const renderIndex = (ctx: ContextReader): string => {
  const title = ctx.string("title");
  const pages = ctx.stringList("pages");

  const list =
    pages.length === 0
      ? '<p class="empty">The wiki is empty.</p>'
      : `<ul class="page-list">
        ${pages.map((name) => `<li><a href="${escapeHtml(wikiPath(name))}">${escapeHtml(name)}</a></li>`).join("\n        ")}
      </ul>`;

  const body = `
      <section class="content-wrap">
        <h1>${escapeHtml(title)}</h1>
        <form method="post" action="/create" class="inline-form">
          <label for="new-page-name" class="sr-only">New page name</label>
          <input id="new-page-name" type="text" name="name" placeholder="New page name" />
          <button type="submit">Create</button>
        </form>
        ${list}
      </section>
    `;

  return renderLayout({ title, body });
};

const renderPage = (ctx: ContextReader): string => {
  const title = ctx.string("title");
  const id = ctx.optionalId("id");
  const newPage = ctx.boolean("newPage");
  const rawContent = ctx.string("rawContent");
  const content = ctx.string("content");
  const timestamp = ctx.string("timestamp");

  const deleteForm = newPage
    ? ""
    : `<form method="post" action="/delete" class="inline-form">
          <input type="hidden" name="id" value="${id ?? ""}" />
          <button type="submit" class="danger">Delete</button>
        </form>`;

  const body = `
      <section class="content-wrap">
        <nav class="page-actions">
          <a class="button" href="/">Home</a>
          ${deleteForm}
        </nav>
        <h1>${escapeHtml(title)}</h1>
        <article class="wiki-content">
          ${content}
        </article>
        <form method="post" action="/save" class="editor">
          <input type="hidden" name="id" value="${id ?? ""}" />
          <input type="hidden" name="title" value="${escapeHtml(title)}" />
          <input type="hidden" name="newPage" value="${newPage ? "yes" : "no"}" />
          <label for="markdown" class="sr-only">Markdown</label>
          <textarea id="markdown" name="markdown" rows="16">${escapeHtml(rawContent)}</textarea>
          <button type="submit">Save</button>
        </form>
        <p class="meta">Rendered: <time datetime="${escapeHtml(timestamp)}">${escapeHtml(formatDate(timestamp))}</time></p>
      </section>
    `;

  return renderLayout({ title, body });
};

const templates = new Map<string, (ctx: ContextReader) => string>([
  ["index", renderIndex],
  ["page", renderPage]
]);

/**
 * Renders a named template into a full HTML document. Fails with a
 * TemplateRenderError for an unknown name or an absent or mistyped key.
 */
export const renderTemplate = (name: string, context: TemplateContext): string => {
  const template = templates.get(name);
  if (!template) {
    throw new TemplateRenderError(name, "no such template");
  }

  return template(contextReader(name, context));
};
