import { BaseCallbackHandler } from "@langchain/core/callbacks/base";
import { LangChainTracer } from "@langchain/core/tracers/tracer_langchain";
import { getConfig } from "#worldsmith/config.js";

/**
 * Default tracer project for generation runs, empty when tracing is off
 */
export const getDefaultTracerProject = (): string | undefined =>
  getConfig("tracer-project") || undefined;

/**
 * Create callbacks array with tracer project name if provided
 * @param tracerProjectName Optional tracer project name for tracing
 * @returns Array of callbacks for model invocation
 */
export const createTracerCallbacks = (
  tracerProjectName?: string
): BaseCallbackHandler[] => {
  if (!tracerProjectName) {
    console.debug(`[model-config] No tracer project name provided, returning empty callbacks`);
    return [];
  }

  const tracer = new LangChainTracer({
    projectName: tracerProjectName,
  });

  console.log(`[model-config] Created tracer for project: ${tracerProjectName}`);
  return [tracer];
};
