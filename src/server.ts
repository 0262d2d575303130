import type { Server } from "node:http";
import { createApp, createHttpServer, type App, type AppOptions } from "./app.js";
import type { Config } from "./core/domain/entities/config.entity.js";

export interface RunningServer {
  app: App;
  server: Server;
  url: string;
  stop(): Promise<void>;
}

/** Builds the app and listens on the configured host/port (0 = ephemeral). */
export async function startServer(
  config: Config,
  options: AppOptions = {},
): Promise<RunningServer> {
  const app = createApp(config, options);
  const server = createHttpServer(app);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.server.port, config.server.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port =
    address !== null && typeof address === "object"
      ? address.port
      : config.server.port;
  const url = `http://${config.server.host}:${port}`;

  return {
    app,
    server,
    url,
    async stop() {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
      await app.close();
    },
  };
}
