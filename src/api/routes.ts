import { FastifyInstance } from "fastify";
import { registerWorldgenRoutes } from "#worldsmith/api/worldgen/routes.js";
import { WorldGenerator } from "#worldsmith/ai/worldgen/world-generator.js";

export async function registerApiRoutes(server: FastifyInstance, generator: WorldGenerator) {
  // Register world generation API routes under /api/worldgen
  await server.register(async function (fastify) {
    await registerWorldgenRoutes(fastify, generator);
  }, { prefix: "/api/worldgen" });
}
