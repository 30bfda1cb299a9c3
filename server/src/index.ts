import { startTakServer } from "./app.ts";
import { loadServerConfig } from "./config.ts";
import { errorMessage } from "../../src/shared/errors.ts";

async function main(): Promise<void> {
  const config = loadServerConfig();
  const { url } = await startTakServer(config);
  console.log(`[tak-server] listening on ${url} (default depth ${config.defaultDepth}, max ${config.maxDepth})`);
}

main().catch((err) => {
  console.error("[tak-server] failed to start", errorMessage(err));
  process.exitCode = 1;
});
