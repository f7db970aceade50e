import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildApp } from "../src/app.js";
import { createPageStore, IN_MEMORY_DATABASE, type PageStore } from "../src/lib/pageStore.js";

vi.mock("../src/lib/templates.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/lib/templates.js")>();
  return {
    ...actual,
    renderTemplate: (name: string, context: Record<string, unknown>): string => {
      if (name === "index") {
        throw new actual.TemplateRenderError(name, 'missing context key "pages"');
      }
      return actual.renderTemplate(name, context);
    }
  };
});

describe("template failures", () => {
  let store: PageStore;
  let app: FastifyInstance;

  beforeEach(async () => {
    store = createPageStore({ filename: IN_MEMORY_DATABASE });
    await store.ensureSchema();
    app = await buildApp({ store });
  });

  afterEach(async () => {
    await app.close();
    await store.close();
  });

  it("answers a failed render with a generic 500", async () => {
    await store.insert("Home", "# Home");

    const res = await app.inject({ method: "GET", url: "/" });

    expect(res.statusCode).toBe(500);
    expect(res.headers["content-type"]).toBe("text/plain; charset=utf-8");
    expect(res.body).toBe("Internal Server Error");
  });

  it("leaves templates that render unaffected", async () => {
    const res = await app.inject({ method: "GET", url: "/wiki/Home" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("<h1>A new page</h1>");
  });
});
