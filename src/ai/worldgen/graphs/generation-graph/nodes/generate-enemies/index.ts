import { JsonObject } from "#worldsmith/ai/worldgen/validators.js";
import { ReportEntry, reportError, reportWarning } from "#worldsmith/ai/worldgen/report.js";
import { GenerationContext } from "../../generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "../../generation-state.js";
import { abortWith, earlierOwner, isCancelled, requestArtifact } from "../../node-shared.js";
import { buildEnemyPrompt } from "./prompts.js";

export function generateEnemies(ctx: GenerationContext) {
  return async (state: GenerationStateType): Promise<GenerationStateUpdate> => {
    const outline = state.outline;
    if (!outline) {
      return abortWith(ctx, [reportError("schema", "enemies", "No chapter outline to generate enemies from")]);
    }

    const enemies: Record<string, JsonObject> = {};
    const enemyIds: string[] = [];
    const report: ReportEntry[] = [];

    ctx.relay.status(`Chapter ${state.chapterNumber}: Generating enemies...`);

    for (const summary of outline.enemies) {
      if (isCancelled(ctx)) break;
      if (!summary.enemyId || enemyIds.includes(summary.enemyId)) continue;
      enemyIds.push(summary.enemyId);

      // A returning enemy keeps the definition its first chapter generated
      const owner = earlierOwner(state, "enemyIds", summary.enemyId);
      if (owner) {
        report.push(
          reportWarning("integrity", "enemies", `Enemy '${summary.enemyId}' reuses the definition from ${owner}`, summary.enemyId)
        );
        continue;
      }

      const prompt = buildEnemyPrompt(summary, state.chapterNumber);
      const outcome = await requestArtifact(ctx, "enemy", "enemies", summary.enemyId, prompt);
      if (outcome.ok) {
        enemies[summary.enemyId] = outcome.document;
      } else {
        report.push(outcome.entry);
      }
    }

    return { enemies, chapterEnemyIds: enemyIds, report };
  };
}
