import "./env";
import { getLogger, isTextGuardError } from "@textguard/core";
import { ApiConfig, loadConfig } from "./config";
import { createApp } from "./app";

const logger = getLogger("api");

function readConfig(): ApiConfig {
  try {
    return loadConfig();
  } catch (e) {
    logger.error("api.config.invalid", {
      error: e instanceof Error ? e.message : String(e),
      details: isTextGuardError(e) ? e.details : undefined,
    });
    process.exit(1);
  }
}

const config = readConfig();
const app = createApp({ config, logger });

app.listen(config.port, () => {
  logger.info("api.listen", { port: config.port, auth: config.apiKeys.length > 0, tokenizer: config.sentenceTokenizer });
});
