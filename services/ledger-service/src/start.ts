import type { BaseLogger } from "pino";
import { buildServer, type BuildServerOptions } from "./server.js";

export interface StartOptions extends BuildServerOptions {
  port: number;
  host?: string;
}

/** Builds and listens; a failure to start is logged before it is rethrown. */
export async function startServer(options: StartOptions, logger: Pick<BaseLogger, "error">) {
  try {
    const app = await buildServer(options);
    await app.listen({ port: options.port, host: options.host ?? "0.0.0.0" });
    return app;
  } catch (err) {
    logger.error({ err }, "ledger-service failed to start");
    throw err;
  }
}
