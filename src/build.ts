import { fileURLToPath } from "url";
import { createApp, routes } from "./app";
import { config } from "./config";
import { buildSite } from "./lib/site-build";

const OUT_DIR = fileURLToPath(new URL("../dist/site", import.meta.url));

async function build() {
  console.log("Building static docs site...\n");
  await buildSite(createApp(config), config, routes, OUT_DIR);
}

build().catch((err) => {
  console.error("Build failed:", err);
  process.exit(1);
});
