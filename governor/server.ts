import { startServer } from "./app.js";
import { getLogger, toError } from "./utils/logger.js";

startServer().catch((error) => {
  getLogger().fatal({ err: toError(error) }, "Failed to start server");
  process.exit(1);
});
