import "dotenv/config";

let config: Record<string, string> = {
    "output-dir": process.env.WORLDSMITH_OUTPUT_DIR || "./stories",
    "default-provider": process.env.WORLDSMITH_PROVIDER || "openai",
    "default-model": process.env.WORLDSMITH_MODEL_NAME || "",
    "tracer-project": process.env.WORLDSMITH_TRACER_PROJECT || "",
}

export function getConfig(configKey: string): string {
    return config[configKey] ?? "";
}

export function setConfig(configKey: string, configValue: string): void {
    config[configKey] = configValue;
}
