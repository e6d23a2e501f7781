import { reportWarning } from "#worldsmith/ai/worldgen/report.js";
import { GenerationContext } from "../../generation-context.js";
import { GenerationStateType, GenerationStateUpdate } from "../../generation-state.js";

export const CANCELLED_REASON = "Generation cancelled";

/**
 * Terminal node for runs that stop early. A node that failed has already
 * set abortReason; otherwise the caller cancelled.
 */
export function abortRun(ctx: GenerationContext) {
  return async (state: GenerationStateType): Promise<GenerationStateUpdate> => {
    if (state.abortReason) {
      ctx.relay.status(`Generation aborted: ${state.abortReason}`);
      return {};
    }

    ctx.relay.status("Generation cancelled.");
    return {
      abortReason: CANCELLED_REASON,
      report: [reportWarning("cancelled", "run", `${CANCELLED_REASON} by caller`)],
    };
  };
}
