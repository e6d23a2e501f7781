declare global {
  namespace NodeJS {
    interface ProcessEnv {
      WORLDSMITH_API_KEY?: string;
      WORLDSMITH_WEB_API_PORT?: string;
      WORLDSMITH_WEB_API_HOST?: string;
      WORLDSMITH_OUTPUT_DIR?: string;
      WORLDSMITH_PROVIDER?: string;
      WORLDSMITH_MODEL_NAME?: string;
      WORLDSMITH_TRACER_PROJECT?: string;
      OPENAI_API_KEY?: string;
      ANTHROPIC_API_KEY?: string;
    }
  }
}

export {};
