import path from "node:path";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import formbody from "@fastify/formbody";
import helmet from "@fastify/helmet";
import fastifyStatic from "@fastify/static";
import { config } from "./config.js";
import type { PageStore } from "./lib/pageStore.js";
import { registerPublicRoutes } from "./routes/publicRoutes.js";
import { registerWikiRoutes } from "./routes/wikiRoutes.js";

export interface BuildAppOptions {
  store: PageStore;
  logger?: FastifyServerOptions["logger"] | undefined;
}

const readClientStatusCode = (error: unknown): number | null => {
  if (!error || typeof error !== "object" || !("statusCode" in error)) return null;
  const { statusCode } = error;
  return typeof statusCode === "number" && statusCode >= 400 && statusCode < 500 ? statusCode : null;
};

const readMessage = (error: unknown): string => (error instanceof Error ? error.message : "");

export const buildApp = async (options: BuildAppOptions): Promise<FastifyInstance> => {
  const app = Fastify({
    logger: options.logger ?? false,
    bodyLimit: 2 * 1024 * 1024
  });

  await app.register(formbody);

  await app.register(helmet, {
    hsts: config.isProduction
      ? {
          maxAge: 31536000,
          includeSubDomains: true
        }
      : false,
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        imgSrc: ["'self'", "data:", "https:"],
        objectSrc: ["'none'"],
        baseUri: ["'self'"],
        formAction: ["'self'"],
        frameAncestors: ["'none'"],
        upgradeInsecureRequests: config.isProduction ? [] : null
      }
    }
  });

  await app.register(fastifyStatic, {
    root: path.join(config.publicDir, "css"),
    prefix: "/css/",
    index: false
  });

  app.setErrorHandler((error, request, reply) => {
    request.log.error(
      {
        err: error,
        route: request.url,
        method: request.method
      },
      "Unhandled request error"
    );

    if (reply.sent) return;

    const clientStatus = readClientStatusCode(error);
    if (clientStatus !== null) {
      void reply.code(clientStatus).type("text/plain; charset=utf-8").send(readMessage(error) || "Bad Request");
      return;
    }

    void reply.code(500).type("text/plain; charset=utf-8").send("Internal Server Error");
  });

  await registerWikiRoutes(app, { store: options.store });
  await registerPublicRoutes(app);

  return app;
};
