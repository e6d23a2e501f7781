/**
 * Helpers shared by the generation nodes.
 */

import {
  ArtifactTypes,
  ValidateOptions,
  ValidationResult,
  JsonObject,
  validateArtifact,
} from "#worldsmith/ai/worldgen/validators.js";
import { ArtifactKind } from "#worldsmith/ai/worldgen/schemas.js";
import { GenerationStage, ReportEntry, reportError } from "#worldsmith/ai/worldgen/report.js";
import { GenerationContext } from "./generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "./generation-state.js";

export type ArtifactOutcome<K extends ArtifactKind> =
  | { ok: true; document: JsonObject; result: ValidationResult<ArtifactTypes[K]> }
  | { ok: false; entry: ReportEntry };

/**
 * Sends one artifact request and validates the reply.
 *
 * Transport and parse failures come back as a single report entry and the
 * artifact is skipped. A reply that parses is kept even when it breaks
 * schema rules; those are reported once by the Validate stage.
 */
export async function requestArtifact<K extends ArtifactKind>(
  ctx: GenerationContext,
  kind: K,
  stage: GenerationStage,
  artifactId: string,
  prompt: string,
  options: ValidateOptions = {}
): Promise<ArtifactOutcome<K>> {
  const response = await ctx.client.send(prompt, ctx.systemPrompt);
  if (!response.ok) {
    ctx.relay.error(`Failed to generate ${kind} ${artifactId}: ${response.error}`);
    return { ok: false, entry: reportError("transport", stage, response.error, artifactId) };
  }

  const result = validateArtifact(kind, response.content, options);
  if (!result.document) {
    const message = result.errors.join("; ");
    console.warn(`[${stage}] Could not parse ${kind} ${artifactId}: ${message}`);
    ctx.relay.error(`Failed to parse ${kind} ${artifactId}: ${message}`);
    return { ok: false, entry: reportError("parse", stage, message, artifactId) };
  }

  if (result.errors.length > 0) {
    console.warn(`[${stage}] ${kind} ${artifactId} has ${result.errors.length} validation error(s)`);
  }
  return { ok: true, document: result.document, result };
}

export function isCancelled(ctx: GenerationContext): boolean {
  return ctx.signal.aborted;
}

/** State update that stops the run; the router sends it to abort_run. */
export function abortWith(ctx: GenerationContext, entries: ReportEntry[]): GenerationStateUpdate {
  const reason = entries.map((e) => e.message).join("; ");
  ctx.relay.error(reason);
  return { abortReason: reason, report: entries };
}

type ChapterIdList = "locationIds" | "questIds" | "enemyIds";

/**
 * Id of the earlier chapter that already lists the artifact id, or null.
 * Artifacts are stored by id alone, so a later chapter may not produce one
 * under the same id.
 */
export function earlierOwner(state: GenerationStateType, list: ChapterIdList, id: string): string | null {
  const owner = state.chapters.find((c) => c.chapterNumber < state.chapterNumber && c[list].includes(id));
  return owner ? owner.chapterId : null;
}
