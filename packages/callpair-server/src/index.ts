import App from "./app";
import { getConfig } from "./config";
import { Store } from "./data";

export type * from "./message";

async function main() {
  const config = getConfig();
  const store = Store.fromConfig(config);
  const { app, relay } = App({ config, store });

  const backend = config.redis != null ? "redis" : "memory";
  const onListening = () => {
    console.log(
      new Date().toISOString(),
      "listening",
      `host=${config.server.host ?? "*"}`,
      `port=${config.server.port}`,
      `store=${backend}`
    );
  };

  const server = config.server.host
    ? app.listen(config.server.port, config.server.host, onListening)
    : app.listen(config.server.port, onListening);

  const shutdown = (signal: string) => {
    console.log(new Date().toISOString(), "shutdown", `signal=${signal}`);
    server.close();
    relay
      .close()
      .then(() => store.close())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          console.error(err);
          process.exit(1);
        }
      );
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

await main();
