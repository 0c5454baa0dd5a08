import dotenv from "dotenv";
import { createApp } from "./app.js";
import { createAnalyticsClient } from "./services/analytics.js";
import { createResponsePipeline } from "./services/pipeline.js";
import { loadConfig } from "./utils/config.js";
import { getPort } from "./utils/env.js";
import { createIntentRouter } from "./utils/intent.js";

dotenv.config();

const config = loadConfig();
const app = createApp({
  config,
  router: createIntentRouter(config.routing),
  pipeline: createResponsePipeline(config.charts),
  analytics: createAnalyticsClient(config.backend)
});
const port = getPort();

app.listen(port, () => {
  console.log(`Server listening on http://localhost:${port}`);
});
