import Fastify, { FastifyServerOptions } from "fastify";
import { authenticate } from "#worldsmith/middleware/auth.js";
import { registerApiRoutes } from "#worldsmith/api/routes.js";
import { WorldGenerator } from "#worldsmith/ai/worldgen/world-generator.js";

export async function buildServer(generator: WorldGenerator, options: FastifyServerOptions = { logger: true }) {
  const server = Fastify(options);

  // Add authentication hook for all routes except health check
  server.addHook("onRequest", async (request, reply) => {
    if (request.url === "/health") return;
    await authenticate(request, reply);
  });

  // Health check endpoint
  server.get("/health", async () => {
    return { status: "ok" };
  });

  await registerApiRoutes(server, generator);
  return server;
}
