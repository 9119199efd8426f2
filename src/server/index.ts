import { serve } from "@hono/node-server";
import { Hono } from "hono";

import type { Logger } from "@/lib/logger";

import { createHealthRoute, type HealthRouteDeps } from "./routes/health";
import { createMetricsRoute, type MetricsRouteDeps } from "./routes/metrics";

export type AppDeps = HealthRouteDeps & MetricsRouteDeps & { logger: Logger };

export interface ServerDeps extends AppDeps {
  port: number;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

export const createApp = (deps: AppDeps): Hono => {
  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    deps.logger.debug("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });

  app.get("/", (c) => c.json({ message: "voice-guard monitoring" }));
  app.route("/health", createHealthRoute(deps));
  app.route("/metrics", createMetricsRoute(deps));

  return app;
};

export const startHttpServer = async (deps: ServerDeps): Promise<HttpServer> => {
  const app = createApp(deps);

  const server = serve(
    {
      fetch: app.fetch,
      port: deps.port,
    },
    (info) => {
      deps.logger.info(`Monitoring server listening on port ${info.port}`);
    },
  );

  return {
    port: deps.port,
    close: async (): Promise<void> => {
      return new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          deps.logger.info("Monitoring server closed");
          resolve();
        });
      });
    },
  };
};
