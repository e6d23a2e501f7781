import { FastifyReply, FastifyRequest } from "fastify";
import {
  CancelGenerationResponse,
  GenerationStatusResponse,
  NextChapterRequest,
  NextChapterRequestSchema,
  NextChapterResponse,
  StartGenerationRequest,
  StartGenerationRequestSchema,
  StartGenerationResponse,
} from "#worldsmith/api/worldgen/schemas.js";
import {
  ContentStoreError,
  GenerationInProgressError,
  WorldConfigError,
} from "#worldsmith/ai/error.js";
import { GenerationReport } from "#worldsmith/ai/worldgen/report.js";
import {
  DEFAULT_STORY_ID,
  WorldGenerator,
  parseWorldConfig,
} from "#worldsmith/ai/worldgen/world-generator.js";

export const PROVIDER_KEY_HEADER = "x-provider-api-key";

function providerCredential(request: FastifyRequest): string | null {
  const value = request.headers[PROVIDER_KEY_HEADER];
  return typeof value === "string" && value.length > 0 ? value : null;
}

function sendError(reply: FastifyReply, error: unknown, operation: string): FastifyReply {
  if (error instanceof GenerationInProgressError) {
    return reply.code(409).send({ error: error.message });
  }
  if (error instanceof WorldConfigError) {
    return reply.code(400).send({ error: error.message, details: error.issues });
  }
  if (error instanceof ContentStoreError) {
    return reply.code(404).send({ error: error.message });
  }
  console.error(`Error in ${operation}:`, error);
  return reply.code(500).send({ error: "Internal server error" });
}

/** Logs the outcome of a run the client is not waiting for. */
function logDetachedRun(operation: string, run: Promise<GenerationReport>): void {
  run
    .then((report) => console.log(`[worldgen-api] ${operation} finished: ${report.status}`))
    .catch((error) => console.error(`[worldgen-api] ${operation} failed:`, error));
}

/**
 * Route handlers bound to one generator. The provider credential travels
 * in the x-provider-api-key header and is never stored.
 */
export function createWorldgenHandlers(generator: WorldGenerator) {
  async function handleStartGeneration(
    request: FastifyRequest<{ Body: StartGenerationRequest }>,
    reply: FastifyReply
  ): Promise<StartGenerationResponse | FastifyReply> {
    const result = StartGenerationRequestSchema.safeParse(request.body);
    if (!result.success) {
      return reply.code(400).send({ error: "Invalid request", details: result.error });
    }
    const credential = providerCredential(request);
    if (!credential) {
      return reply.code(400).send({ error: `Missing ${PROVIDER_KEY_HEADER} header` });
    }
    if (generator.isGenerating) {
      return sendError(reply, new GenerationInProgressError(), "startGeneration");
    }

    try {
      const config = parseWorldConfig(result.data.config);
      const storyId = config.storyId ?? DEFAULT_STORY_ID;
      const run = generator.startGeneration(config, credential);
      if (!result.data.wait) {
        logDetachedRun("startGeneration", run);
        return { storyId, state: "running" };
      }
      const report = await run;
      return { storyId, state: report.status, report };
    } catch (error) {
      return sendError(reply, error, "startGeneration");
    }
  }

  async function handleNextChapter(
    request: FastifyRequest<{ Body: NextChapterRequest }>,
    reply: FastifyReply
  ): Promise<NextChapterResponse | FastifyReply> {
    const result = NextChapterRequestSchema.safeParse(request.body ?? {});
    if (!result.success) {
      return reply.code(400).send({ error: "Invalid request", details: result.error });
    }
    const credential = providerCredential(request);
    if (!credential) {
      return reply.code(400).send({ error: `Missing ${PROVIDER_KEY_HEADER} header` });
    }
    if (generator.isGenerating) {
      return sendError(reply, new GenerationInProgressError(), "generateNextChapter");
    }

    try {
      const storyId = result.data.storyId ?? generator.getStatus().storyId;
      if (!storyId) {
        throw new WorldConfigError("No world config loaded. Start a new world first.");
      }
      // Missing stories are rejected before the run is detached
      await generator.store.loadManifest(storyId);
      if (generator.isGenerating) {
        return sendError(reply, new GenerationInProgressError(), "generateNextChapter");
      }

      const run = generator.generateNextChapter(credential, storyId);
      if (!result.data.wait) {
        logDetachedRun("generateNextChapter", run);
        return { storyId, state: "running" };
      }
      const report = await run;
      return { storyId, state: report.status, report };
    } catch (error) {
      return sendError(reply, error, "generateNextChapter");
    }
  }

  async function handleCancelGeneration(): Promise<CancelGenerationResponse> {
    return { cancelled: generator.cancel() };
  }

  async function handleGetStatus(): Promise<GenerationStatusResponse> {
    return generator.getStatus();
  }

  return {
    handleStartGeneration,
    handleNextChapter,
    handleCancelGeneration,
    handleGetStatus,
  };
}
