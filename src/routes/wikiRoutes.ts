import type { FastifyInstance } from "fastify";
import { renderMarkdown } from "../lib/markdown.js";
import type { PageStore } from "../lib/pageStore.js";
import { wikiPath } from "../lib/render.js";
import { renderTemplate } from "../lib/templates.js";
import type { PageView, SaveForm } from "../types.js";

export const DEFAULT_PAGE_CONTENT = "# A new page\n\nFeel free to write in Markdown!\n";

export interface WikiRouteDependencies {
  store: PageStore;
}

const asObject = (value: unknown): Record<string, unknown> => {
  if (!value || typeof value !== "object") return {};
  return Object.fromEntries(Object.entries(value));
};

const readSingle = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value.length > 0) {
    return String(value[0] ?? "");
  }
  return "";
};

export const parsePageId = (raw: string): number => {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new Error(`Invalid page id "${raw}"`);
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`Page id "${raw}" is out of range`);
  }
  return parsed;
};

export const readSaveForm = (rawBody: unknown): SaveForm => {
  const body = asObject(rawBody);
  const newPage = readSingle(body.newPage) === "yes";

  return {
    id: newPage ? null : parsePageId(readSingle(body.id)),
    title: readSingle(body.title),
    markdown: readSingle(body.markdown),
    newPage
  };
};

export const resolvePageView = async (store: PageStore, name: string): Promise<PageView> => {
  const page = await store.getByName(name);
  if (page) {
    return { kind: "stored", page };
  }

  return { kind: "draft", name, content: DEFAULT_PAGE_CONTENT };
};

export const registerWikiRoutes = async (app: FastifyInstance, deps: WikiRouteDependencies): Promise<void> => {
  const { store } = deps;

  app.get("/", async (_request, reply) => {
    const names = await store.listNames();
    const pages = [...names].sort();

    return reply.type("text/html; charset=utf-8").send(
      renderTemplate("index", {
        title: "Wiki home",
        pages
      })
    );
  });

  app.get<{ Params: { name: string } }>("/wiki/:name", async (request, reply) => {
    const name = request.params.name;
    const view = await resolvePageView(store, name);
    const rawContent = view.kind === "stored" ? view.page.content : view.content;

    return reply.type("text/html; charset=utf-8").send(
      renderTemplate("page", {
        title: name,
        id: view.kind === "stored" ? view.page.id : null,
        newPage: view.kind === "draft",
        rawContent,
        content: renderMarkdown(rawContent),
        timestamp: new Date().toISOString()
      })
    );
  });

  app.post("/create", async (request, reply) => {
    const name = readSingle(asObject(request.body).name);
    return reply.redirect(name.length === 0 ? "/" : wikiPath(name), 303);
  });

  app.post("/save", async (request, reply) => {
    const form = readSaveForm(request.body);

    if (form.id === null) {
      const id = await store.insert(form.title, form.markdown);
      request.log.info({ pageId: id, name: form.title }, "page created");
    } else {
      const updated = await store.update(form.id, form.markdown);
      if (updated) {
        request.log.info({ pageId: form.id, name: form.title }, "page updated");
      } else {
        request.log.warn({ pageId: form.id }, "save targeted a page id that does not exist");
      }
    }

    return reply.redirect(wikiPath(form.title), 303);
  });

  app.post("/delete", async (request, reply) => {
    const id = parsePageId(readSingle(asObject(request.body).id));
    const deleted = await store.delete(id);
    if (deleted) {
      request.log.info({ pageId: id }, "page deleted");
    } else {
      request.log.warn({ pageId: id }, "delete targeted a page id that does not exist");
    }

    return reply.redirect("/", 303);
  });
};
