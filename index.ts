import { main } from "./src/server";
import { ConfigError } from "./src/utils/loadEnv";

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error("❌ Failed to start server:", error);
  }
  process.exit(1);
});
