import type { FastifyInstance } from "fastify";
import { renderLayout } from "../lib/render.js";

export const registerPublicRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/health", async () => ({ status: "ok", at: new Date().toISOString() }));

  app.setNotFoundHandler(async (_request, reply) => {
    const body = `
      <section class="content-wrap">
        <h1>404</h1>
        <p>The requested page does not exist.</p>
        <a class="button" href="/">Back to the index</a>
      </section>
    `;

    return reply.code(404).type("text/html; charset=utf-8").send(
      renderLayout({
        title: "404",
        body,
        error: "Not found"
      })
    );
  });
};
