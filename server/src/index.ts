import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { logger } from "./logger";

dotenv.config();

const config = loadConfig();
logger.setLevel(config.logLevel);

if (config.allowAnonymous) {
  logger.warn("ALLOW_ANONYMOUS is on: requests without a valid token are served as anonymous");
}

const app = createApp(config);

app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port}`);
});
