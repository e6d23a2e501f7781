import "dotenv/config";
import { buildServer } from "#worldsmith/server.js";
import { WorldGenerator } from "#worldsmith/ai/worldgen/world-generator.js";
import { logApplicationEvent, logSafeEnvironmentInfo, logSecretStatus } from "#worldsmith/util/safe-logging.js";

const start = async () => {
  logApplicationEvent("web-api", "starting");
  logSafeEnvironmentInfo();
  logSecretStatus("WORLDSMITH_API_KEY", process.env.WORLDSMITH_API_KEY);

  const server = await buildServer(new WorldGenerator());
  try {
    const port = parseInt(process.env.WORLDSMITH_WEB_API_PORT || "3000", 10);
    const host = process.env.WORLDSMITH_WEB_API_HOST || "0.0.0.0";

    await server.listen({ port, host });
    logApplicationEvent("web-api", "started", { port, host });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
};

start().catch((error) => {
  console.error("[web-api] Failed to start:", error);
  process.exit(1);
});
