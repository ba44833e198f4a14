import { getConfig } from "./config.js";
import { buildServer } from "./server.js";

const config = getConfig();
const app = buildServer();

app.listen({ port: config.PORT, host: config.HOST }).catch((error) => {
  app.log.error(error);
  process.exit(1);
});
