import Fastify, { FastifyInstance } from "fastify";
import { registerRoutes, RouteDeps } from "./api/routes";
import { registerHealthRoutes } from "./health";
import { propagateTraceId } from "./trace";

export async function buildApp(deps: RouteDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  app.addHook("onRequest", (request, reply, done) => {
    propagateTraceId(request, reply);
    done();
  });
  await registerHealthRoutes(app);
  await registerRoutes(app, deps);
  return app;
}
