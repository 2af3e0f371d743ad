import { config } from "../config";
import { createLogger, errorMessage } from "../logger";
import { MongoStore } from "../store/mongo";
import { Store } from "../store/types";
import { createApp } from "./app";

const log = createLogger("api");

async function main() {
  let store: Store | null = null;
  if (config.DATABASE_URL) {
    try {
      store = await MongoStore.connect(config.DATABASE_URL, config.DATABASE_NAME);
    } catch (err) {
      log.warn(`database unavailable, store-backed routes will answer 503: ${errorMessage(err)}`);
    }
  } else {
    log.warn("DATABASE_URL is not set, store-backed routes will answer 503");
  }

  const app = createApp({ store, logRequests: true });
  const server = app.listen(config.PORT, () => {
    log.info(`listening on http://localhost:${config.PORT}`);
  });

  const shutdown = () => {
    server.close(() => {
      (store ? store.close() : Promise.resolve())
        .catch((err) => log.error(`close failed: ${errorMessage(err)}`))
        .finally(() => process.exit(0));
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((e) => {
  log.error(`Error: ${errorMessage(e)}`);
  process.exit(1);
});
