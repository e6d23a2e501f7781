import { FastifyInstance } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import { WorldGenerator } from "#worldsmith/ai/worldgen/world-generator.js";
import { createWorldgenHandlers } from "./handler.js";
import {
  CancelGenerationResponseSchema,
  GenerationStatusResponseSchema,
  NextChapterRequestSchema,
  NextChapterResponseSchema,
  StartGenerationRequestSchema,
  StartGenerationResponseSchema,
} from "#worldsmith/api/worldgen/schemas.js";

export async function registerWorldgenRoutes(server: FastifyInstance, generator: WorldGenerator) {
  const handlers = createWorldgenHandlers(generator);

  // Start a new story
  server.post("/start", {
    schema: {
      body: zodToJsonSchema(StartGenerationRequestSchema, "startGenerationRequest"),
      response: {
        200: zodToJsonSchema(StartGenerationResponseSchema, "startGenerationResponse"),
      },
    },
    handler: handlers.handleStartGeneration,
  });

  // Add one chapter to a persisted story
  server.post("/next-chapter", {
    schema: {
      body: zodToJsonSchema(NextChapterRequestSchema, "nextChapterRequest"),
      response: {
        200: zodToJsonSchema(NextChapterResponseSchema, "nextChapterResponse"),
      },
    },
    handler: handlers.handleNextChapter,
  });

  server.post("/cancel", {
    schema: {
      response: {
        200: zodToJsonSchema(CancelGenerationResponseSchema, "cancelGenerationResponse"),
      },
    },
    handler: handlers.handleCancelGeneration,
  });

  server.get("/status", {
    schema: {
      response: {
        200: zodToJsonSchema(GenerationStatusResponseSchema, "generationStatusResponse"),
      },
    },
    handler: handlers.handleGetStatus,
  });
}
