// api/src/index.ts
import { config } from "./config.js";
import { createApp } from "./app.js";

const app = createApp();

app.listen(config.port, () => {
  console.log(`api:${config.port} (${config.nodeEnv}, default unit ${config.defaults.unit})`);
});
