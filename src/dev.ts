import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { config, resolvePort } from "./config";

const port = resolvePort();

serve({ fetch: createApp(config).fetch, port }, (info) => {
  console.log(`Docs server running at http://localhost:${info.port}${config.basePath}/`);
});
